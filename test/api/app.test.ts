import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../src/api/app.js';
import { signInitData } from '../../src/api/auth/telegram-init-data.js';
import { mapErrorCodeToStatus } from '../../src/api/middleware/error-handler.js';
import { PROMPT_TEXT, CONFIRMED_TEXT } from '../../src/services/notification/messages.js';
import {
  FakeChannel,
  InMemoryPendingUpdateStore,
  InMemoryProfileStore,
  StaticOfferProvider,
} from '../helpers/in-memory-stores.js';
import { makeProfile, makeSnapshot } from '../helpers/fixtures.js';

const BOT_TOKEN = 'test-token';
const WEBHOOK_SECRET = 'test-secret';

const profiles = new InMemoryProfileStore();
const pendingUpdates = new InMemoryPendingUpdateStore();
const channel = new FakeChannel();

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({
    profiles,
    pendingUpdates,
    channel,
    offers: new StaticOfferProvider(makeSnapshot()),
    botToken: BOT_TOKEN,
    webhookSecret: WEBHOOK_SECRET,
  });

  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

beforeEach(async () => {
  profiles.profiles.clear();
  pendingUpdates.fragments.clear();
  channel.edited.length = 0;
  channel.answered.length = 0;
  await profiles.put(makeProfile());
});

function postUpdate(body: unknown, secret: string | undefined = WEBHOOK_SECRET): Promise<Response> {
  return fetch(`${baseUrl}/telegram/webhook`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...(secret !== undefined && { 'X-Telegram-Bot-Api-Secret-Token': secret }),
    },
    body: JSON.stringify(body),
  });
}

function authHeader(userId: number): Record<string, string> {
  const params = new URLSearchParams({
    auth_date: String(Math.floor(Date.now() / 1000)),
    user: JSON.stringify({ id: userId }),
  });
  params.set('hash', signInitData(params, BOT_TOKEN));
  return { 'X-Telegram-Init-Data': params.toString() };
}

describe('GET /health', () => {
  it('reports ok', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('ok');
  });
});

describe('POST /telegram/webhook', () => {
  it('rejects a wrong secret token', async () => {
    const res = await postUpdate({ update_id: 1 }, 'wrong');

    expect(res.status).toBe(401);
  });

  it('acknowledges updates without a callback', async () => {
    const res = await postUpdate({ update_id: 1, message: { text: '/start' } });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ success: true, data: { handled: false }, error: null });
  });

  it('accepts a pending update from the button', async () => {
    await pendingUpdates.save('1001', {
      electricity: { kind: 'fixed', band: 'single', energyRate: 0.12, commercializationFee: 72 },
      updatedServices: ['electricity'],
      createdAt: new Date(),
    });

    const res = await postUpdate({
      update_id: 2,
      callback_query: {
        id: 'cb-1',
        from: { id: 1001 },
        data: 'rate_update:accept:1001',
        message: { message_id: 9, chat: { id: 1001 }, text: `Offer\n\n${PROMPT_TEXT}` },
      },
    });
    const body = await res.json();

    expect(body.data).toEqual({ handled: true, action: 'accept', status: 'accepted' });
    expect((await profiles.get('1001'))?.electricity.energyRate).toBe(0.12);
    expect(channel.edited).toEqual([{ chatId: '1001', messageId: 9, text: `Offer\n\n${CONFIRMED_TEXT}` }]);
  });

  it('rejects a malformed update', async () => {
    const res = await postUpdate({ callback_query: 'nope' });
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(body.error.code).toBe('VALIDATION_ERROR');
  });
});

describe('GET /api/user/rates', () => {
  it('returns the authenticated user tariffs', async () => {
    const res = await fetch(`${baseUrl}/api/user/rates`, { headers: authHeader(1001) });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.data).toEqual({
      userId: '1001',
      electricity: { kind: 'fixed', band: 'single', energyRate: 0.145, commercializationFee: 72 },
      gas: null,
    });
  });

  it('returns 404 for unknown users', async () => {
    const res = await fetch(`${baseUrl}/api/user/rates`, { headers: authHeader(2002) });

    expect(res.status).toBe(404);
  });

  it('returns 401 without init data', async () => {
    const res = await fetch(`${baseUrl}/api/user/rates`);
    const body = await res.json();

    expect(res.status).toBe(401);
    expect(body.error.code).toBe('AUTH_INVALID');
  });
});

describe('GET /api/rates/current', () => {
  it('returns the current snapshot', async () => {
    const res = await fetch(`${baseUrl}/api/rates/current`, { headers: authHeader(1001) });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.data.sourceDate).toBe('2026-10-01');
    expect(body.data.electricity.fixed.single).toEqual({ energyRate: 0.12, commercializationFee: 72 });
  });
});

describe('GET /openapi.json', () => {
  it('serves the API description', async () => {
    const res = await fetch(`${baseUrl}/openapi.json`);
    const body = await res.json();

    expect(body.info.title).toBe('Tariff Tracker API');
  });
});

describe('mapErrorCodeToStatus', () => {
  it('maps codes to statuses', () => {
    expect(mapErrorCodeToStatus('AUTH_INVALID')).toBe(401);
    expect(mapErrorCodeToStatus('PROFILE_NOT_FOUND')).toBe(404);
    expect(mapErrorCodeToStatus('VALIDATION_ERROR')).toBe(422);
    expect(mapErrorCodeToStatus('OFFERS_UNAVAILABLE')).toBe(503);
    expect(mapErrorCodeToStatus('CONFIG_INVALID')).toBe(500);
  });
});
