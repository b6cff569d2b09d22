import { http, HttpResponse } from 'msw';

export const TEST_API_BASE_URL = 'https://bot-api.test';
export const TEST_BOT_TOKEN = 'test-bot-token';

/**
 * URL of a Bot API method on the test API host
 */
export function botApiUrl(method: string): string {
  return `${TEST_API_BASE_URL}/bot${TEST_BOT_TOKEN}/${method}`;
}

// Default handlers; tests add per-case handlers with server.use()
export const handlers = [
  http.post(botApiUrl('getMe'), () =>
    HttpResponse.json({
      ok: true,
      result: { id: 424242, is_bot: true, first_name: 'Relay', username: 'relay_test_bot' },
    })
  ),
];
