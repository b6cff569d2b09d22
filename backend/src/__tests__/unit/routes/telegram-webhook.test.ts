/**
 * Webhook and health route tests (supertest against createApp)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '@/app';
import { SECRET_HEADER } from '@/routes/telegram-webhook';
import type { TelegramUpdate } from '@/infrastructure/telegram';

const UPDATE = {
  update_id: 10,
  message: {
    message_id: 1,
    date: 1_700_000_000,
    chat: { id: 1001, type: 'private' },
    from: { id: 1001, is_bot: false, first_name: 'Ada' },
    text: '/start',
  },
};

describe('POST /api/telegram/webhook', () => {
  let onUpdate: ReturnType<typeof vi.fn<(update: TelegramUpdate) => Promise<void>>>;
  let app: Express;

  beforeEach(() => {
    onUpdate = vi.fn<(update: TelegramUpdate) => Promise<void>>().mockResolvedValue(undefined);
    app = createApp({ onUpdate, webhookSecret: 'test-secret', requestLogging: false });
  });

  it('acknowledges a valid update and hands it on', async () => {
    const response = await request(app).post('/api/telegram/webhook').set(SECRET_HEADER, 'test-secret').send(UPDATE);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
    expect(onUpdate).toHaveBeenCalledTimes(1);
    expect(onUpdate.mock.calls[0]?.[0]).toMatchObject({ update_id: 10, message: { text: '/start' } });
  });

  it('rejects a wrong secret', async () => {
    const response = await request(app).post('/api/telegram/webhook').set(SECRET_HEADER, 'nope').send(UPDATE);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      error: 'Unauthorized',
      message: 'Invalid webhook secret',
      code: 'UNAUTHORIZED',
    });
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('rejects a missing secret', async () => {
    const response = await request(app).post('/api/telegram/webhook').send(UPDATE);

    expect(response.status).toBe(401);
  });

  it('accepts any caller when no secret is configured', async () => {
    const open = createApp({ onUpdate, requestLogging: false });

    const response = await request(open).post('/api/telegram/webhook').send(UPDATE);

    expect(response.status).toBe(200);
  });

  it('rejects a malformed update', async () => {
    const response = await request(app)
      .post('/api/telegram/webhook')
      .set(SECRET_HEADER, 'test-secret')
      .send({ message: { text: 'no ids' } });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Malformed update' });
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('rejects a body that is not JSON', async () => {
    const response = await request(app)
      .post('/api/telegram/webhook')
      .set(SECRET_HEADER, 'test-secret')
      .set('Content-Type', 'application/json')
      .send('{"update_id":');

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ code: 'BAD_REQUEST', message: 'Request body is not valid JSON' });
  });

  it('still acknowledges when processing fails', async () => {
    onUpdate.mockRejectedValue(new Error('handler crashed'));

    const response = await request(app).post('/api/telegram/webhook').set(SECRET_HEADER, 'test-secret').send(UPDATE);

    expect(response.status).toBe(200);
  });

  it('answers unknown routes with 404', async () => {
    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('GET /health', () => {
  it('reports every dependency', async () => {
    const app = createApp({
      onUpdate: async () => undefined,
      requestLogging: false,
      healthChecks: { database: async () => true, redis: async () => false },
    });

    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({ status: 'unhealthy', services: { database: 'up', redis: 'down' } });
  });

  it('is healthy without checks', async () => {
    const app = createApp({ onUpdate: async () => undefined, requestLogging: false });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'healthy', services: {} });
  });

  it('answers liveness', async () => {
    const app = createApp({ onUpdate: async () => undefined, requestLogging: false });

    const response = await request(app).get('/health/liveness');

    expect(response.body).toMatchObject({ status: 'alive' });
  });
});
