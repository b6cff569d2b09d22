/**
 * TelegramClient Unit Tests
 *
 * The Bot API is served by msw on the test host.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse, type JsonBodyType } from 'msw';
import { server } from '@/__tests__/mocks/server';
import { TEST_API_BASE_URL, TEST_BOT_TOKEN, botApiUrl } from '@/__tests__/mocks/handlers';
import { TelegramClient, increasingRuns } from '@/infrastructure/telegram/TelegramClient';
import { TelegramApiError } from '@/shared/errors/relay-errors';

type Body = Record<string, unknown>;

/**
 * Answer `method` with `respond(body)` and record every request body
 */
function serve(method: string, respond: (body: Body) => JsonBodyType): Body[] {
  const bodies: Body[] = [];
  server.use(
    http.post(botApiUrl(method), async ({ request }) => {
      const json: unknown = await request.json();
      const body: Body = typeof json === 'object' && json !== null ? { ...json } : {};
      bodies.push(body);
      return HttpResponse.json(respond(body));
    })
  );
  return bodies;
}

function relayedIds(body: Body): unknown {
  const ids = Array.isArray(body.message_ids) ? body.message_ids : [];
  return ids.map((id: unknown) => ({ message_id: Number(id) + 1000 }));
}

describe('increasingRuns', () => {
  it('keeps an increasing list in one run', () => {
    expect(increasingRuns([1, 2, 5])).toEqual([[1, 2, 5]]);
  });

  it('starts a new run wherever the order drops', () => {
    expect(increasingRuns([5, 6, 2, 3, 3])).toEqual([[5, 6], [2, 3], [3]]);
  });

  it('caps the run length', () => {
    expect(increasingRuns([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no runs for no ids', () => {
    expect(increasingRuns([])).toEqual([]);
  });
});

describe('TelegramClient', () => {
  let client: TelegramClient;

  beforeEach(() => {
    client = new TelegramClient({ botToken: TEST_BOT_TOKEN, baseUrl: `${TEST_API_BASE_URL}/` });
  });

  it('reads the bot identity', async () => {
    const me = await client.getMe();

    expect(me.username).toBe('relay_test_bot');
    expect(me.is_bot).toBe(true);
  });

  it('sends a message with markup and reply parameters', async () => {
    const bodies = serve('sendMessage', () => ({
      ok: true,
      result: { message_id: 77, date: 1, chat: { id: 1001, type: 'private' } },
    }));

    const sent = await client.sendMessage(1001, 'hello', {
      replyMarkup: { inline_keyboard: [[{ text: 'Go', url: 'https://t.me/relay_test_bot' }]] },
      replyToMessageId: 5,
      disableLinkPreview: true,
    });

    expect(sent).toEqual({ messageId: 77 });
    expect(bodies).toEqual([
      {
        chat_id: 1001,
        text: 'hello',
        reply_markup: { inline_keyboard: [[{ text: 'Go', url: 'https://t.me/relay_test_bot' }]] },
        reply_parameters: { message_id: 5 },
        link_preview_options: { is_disabled: true },
      },
    ]);
  });

  it('leaves out unset options', async () => {
    const bodies = serve('sendMessage', () => ({
      ok: true,
      result: { message_id: 78, chat: { id: 1001, type: 'private' } },
    }));

    await client.sendMessage(1001, 'plain');

    expect(bodies).toEqual([{ chat_id: 1001, text: 'plain' }]);
  });

  it('raises TelegramApiError for ok=false', async () => {
    serve('deleteMessage', () => ({
      ok: false,
      error_code: 400,
      description: 'Bad Request: message to delete not found',
    }));

    const error = await client.deleteMessage(1001, 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TelegramApiError);
    expect(error).toMatchObject({
      method: 'deleteMessage',
      errorCode: 400,
      description: 'Bad Request: message to delete not found',
    });
  });

  it('carries the retry delay of a rate limit', async () => {
    serve('sendMessage', () => ({
      ok: false,
      error_code: 429,
      description: 'Too Many Requests: retry after 3',
      parameters: { retry_after: 3 },
    }));

    await expect(client.sendMessage(1001, 'x')).rejects.toMatchObject({ errorCode: 429, retryAfter: 3 });
  });

  it('reports a body that is not JSON with the HTTP status', async () => {
    server.use(http.post(botApiUrl('getMe'), () => new HttpResponse('bad gateway', { status: 502 })));

    await expect(client.getMe()).rejects.toMatchObject({ method: 'getMe', errorCode: 502 });
  });

  it('rejects a result of the wrong shape', async () => {
    serve('getChatMember', () => ({ ok: true, result: { status: 'owner' } }));

    await expect(client.getChatMemberStatus(-100, 1001)).rejects.toThrow('Unexpected getChatMember result shape');
  });

  it('reads a membership status', async () => {
    const bodies = serve('getChatMember', () => ({
      ok: true,
      result: { status: 'member', user: { id: 1001, is_bot: false, first_name: 'A' } },
    }));

    expect(await client.getChatMemberStatus(-100, 1001)).toBe('member');
    expect(bodies).toEqual([{ chat_id: -100, user_id: 1001 }]);
  });

  it('forwards out-of-order ids as increasing runs and keeps the order', async () => {
    const bodies = serve('forwardMessages', (body) => ({ ok: true, result: relayedIds(body) }));

    const refs = await client.forwardMessages(-200, 1001, [12, 13, 10, 11]);

    expect(bodies.map((b) => b.message_ids)).toEqual([
      [12, 13],
      [10, 11],
    ]);
    expect(refs).toEqual([1012, 1013, 1010, 1011]);
  });

  it('copies more than 100 ids in chunks', async () => {
    const bodies = serve('copyMessages', (body) => ({ ok: true, result: relayedIds(body) }));
    const ids = Array.from({ length: 150 }, (_, i) => i + 1);

    const refs = await client.copyMessages(1001, -200, ids);

    expect(bodies.map((b) => (Array.isArray(b.message_ids) ? b.message_ids.length : 0))).toEqual([100, 50]);
    expect(refs).toHaveLength(150);
    expect(refs[149]).toBe(1150);
  });

  it('deletes in chunks of 100', async () => {
    const bodies = serve('deleteMessages', () => ({ ok: true, result: true }));

    await client.deleteMessages(1001, Array.from({ length: 201 }, (_, i) => i + 1));

    expect(bodies.map((b) => (Array.isArray(b.message_ids) ? b.message_ids.length : 0))).toEqual([100, 100, 1]);
  });

  it('answers a callback query', async () => {
    const bodies = serve('answerCallbackQuery', () => ({ ok: true, result: true }));

    await client.answerCallbackQuery('cb-1', { text: 'Done', showAlert: true });

    expect(bodies).toEqual([{ callback_query_id: 'cb-1', text: 'Done', show_alert: true }]);
  });

  it('registers the webhook for messages and callbacks', async () => {
    const bodies = serve('setWebhook', () => ({ ok: true, result: true }));

    await client.setWebhook('https://relay.test/api/telegram/webhook', 'test-secret');

    expect(bodies).toEqual([
      {
        url: 'https://relay.test/api/telegram/webhook',
        secret_token: 'test-secret',
        allowed_updates: ['message', 'callback_query'],
      },
    ]);
  });
});
