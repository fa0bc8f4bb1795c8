import { describe, it, expect, vi } from 'vitest';
import { TelegramChannel } from '../../src/infrastructure/messaging/telegram.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createChannel(fetchFn: typeof fetch): TelegramChannel {
  return new TelegramChannel({ botToken: 'test-token', baseUrl: 'https://telegram.test', fetchFn });
}

describe('TelegramChannel.send', () => {
  it('posts an HTML message with the inline keyboard', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ ok: true, result: { message_id: 55, chat: { id: 1001 } } }),
    );
    const channel = createChannel(fetchFn);

    const result = await channel.send('1001', '<b>hi</b>', [[{ text: 'Yes', callbackData: 'rate_update:accept:1001' }]]);

    expect(result).toEqual({ ok: true, value: { chatId: '1001', messageId: 55 } });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://telegram.test/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '1001',
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      reply_markup: { inline_keyboard: [[{ text: 'Yes', callback_data: 'rate_update:accept:1001' }]] },
    });
  });

  it('classifies a blocked recipient', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' }, 403),
    );

    const result = await createChannel(fetchFn).send('1001', 'hi');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('RECIPIENT_BLOCKED');
    expect(result.error.retryable).toBe(false);
  });

  it('classifies rate limiting as retryable', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ ok: false, error_code: 429, description: 'Too Many Requests: retry after 3', parameters: { retry_after: 3 } }, 429),
    );

    const result = await createChannel(fetchFn).send('1001', 'hi');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DISPATCH_RATE_LIMITED');
    expect(result.error.retryable).toBe(true);
  });

  it('classifies timeouts', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(timeout);

    const result = await createChannel(fetchFn).send('1001', 'hi');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DISPATCH_TIMEOUT');
  });

  it('classifies other API errors', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ ok: false, error_code: 400, description: "Bad Request: can't parse entities" }, 400),
    );

    const result = await createChannel(fetchFn).send('1001', '<b>');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DISPATCH_FAILED');
    expect(result.error.retryable).toBe(false);
    expect(result.error.details).toBe("Bad Request: can't parse entities");
  });

  it('treats network failures as retryable', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const result = await createChannel(fetchFn).send('1001', 'hi');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DISPATCH_FAILED');
    expect(result.error.retryable).toBe(true);
  });
});

describe('TelegramChannel callbacks', () => {
  it('answers a callback query', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ ok: true, result: true }));

    const result = await createChannel(fetchFn).answerCallback('cb-1');

    expect(result.ok).toBe(true);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://telegram.test/bottest-token/answerCallbackQuery');
    expect(JSON.parse(String(init?.body))).toEqual({ callback_query_id: 'cb-1' });
  });

  it('edits a message and removes its keyboard', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ ok: true, result: true }));

    await createChannel(fetchFn).editMessage('1001', 7, 'done');

    const [, init] = fetchFn.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '1001',
      message_id: 7,
      text: 'done',
      reply_markup: { inline_keyboard: [] },
    });
  });
});
