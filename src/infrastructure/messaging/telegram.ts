import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { InlineKeyboard, MessagingChannel, SentMessage } from './types.js';

const API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10_000;

const log = logger.child({ module: 'telegram' });

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
  result: z.unknown().optional(),
});

const sentMessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.number().int() }),
});

type ApiResponse = z.infer<typeof apiResponseSchema>;

export interface TelegramChannelOptions {
  botToken: string;
  timeoutMs?: number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

// Bot API descriptions for chats that will never accept another message.
const BLOCKED_PATTERNS = [
  /bot was blocked by the user/i,
  /user is deactivated/i,
  /chat not found/i,
  /bot was kicked/i,
];

function isBlocked(status: number, description: string): boolean {
  return (status === 403 || status === 400) && BLOCKED_PATTERNS.some((pattern) => pattern.test(description));
}

function isTimeout(cause: unknown): boolean {
  return cause instanceof Error && (cause.name === 'TimeoutError' || cause.name === 'AbortError');
}

function toKeyboardMarkup(keyboard: InlineKeyboard) {
  return {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) => ({ text: button.text, callback_data: button.callbackData })),
    ),
  };
}

export class TelegramChannel implements MessagingChannel {
  private readonly botToken: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: TelegramChannelOptions) {
    this.botToken = options.botToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(
    userId: string,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<Result<SentMessage, AppError>> {
    const response = await this.call('sendMessage', {
      chat_id: userId,
      text,
      parse_mode: 'HTML',
      ...(keyboard && { reply_markup: toKeyboardMarkup(keyboard) }),
    }, { userId });
    if (!response.ok) return response;

    const parsed = sentMessageSchema.safeParse(response.value);
    if (!parsed.success) {
      log.error({ userId, errorCode: ErrorCode.DISPATCH_FAILED, retryable: false }, 'Unexpected sendMessage result');
      return err(createAppError(ErrorCode.DISPATCH_FAILED, 'Unexpected sendMessage result', false, parsed.error.message));
    }

    return ok({ chatId: String(parsed.data.chat.id), messageId: parsed.data.message_id });
  }

  async answerCallback(callbackId: string, text?: string): Promise<Result<void, AppError>> {
    const response = await this.call('answerCallbackQuery', {
      callback_query_id: callbackId,
      ...(text !== undefined && { text }),
    }, { callbackId });
    return response.ok ? ok(undefined) : response;
  }

  async editMessage(chatId: string, messageId: number, text: string): Promise<Result<void, AppError>> {
    const response = await this.call('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      reply_markup: { inline_keyboard: [] },
    }, { chatId, messageId });
    return response.ok ? ok(undefined) : response;
  }

  private async call(
    method: string,
    body: Record<string, unknown>,
    ctx: Record<string, unknown>,
  ): Promise<Result<unknown, AppError>> {
    const startTime = Date.now();

    let status: number;
    let payload: ApiResponse;
    try {
      const response = await this.fetchFn(`${this.baseUrl}/bot${this.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      payload = apiResponseSchema.parse(await response.json());
    } catch (cause) {
      const latencyMs = Date.now() - startTime;
      const details = errorMessage(cause);

      if (isTimeout(cause)) {
        log.warn({ ...ctx, method, latencyMs, errorCode: ErrorCode.DISPATCH_TIMEOUT, retryable: true }, 'Telegram request timed out');
        return err(createAppError(ErrorCode.DISPATCH_TIMEOUT, `Telegram ${method} timed out`, true, details));
      }

      log.error({ ...ctx, method, latencyMs, errorCode: ErrorCode.DISPATCH_FAILED, retryable: true, error: details }, 'Telegram request failed');
      return err(createAppError(ErrorCode.DISPATCH_FAILED, `Telegram ${method} failed`, true, details));
    }

    const latencyMs = Date.now() - startTime;
    if (payload.ok) {
      log.debug({ ...ctx, method, latencyMs }, 'Telegram request succeeded');
      return ok(payload.result);
    }

    return this.mapError(method, payload.error_code ?? status, payload, { ...ctx, latencyMs });
  }

  private mapError(
    method: string,
    status: number,
    payload: ApiResponse,
    ctx: Record<string, unknown>,
  ): Result<never, AppError> {
    const details = payload.description ?? `HTTP ${status}`;
    const logCtx = { ...ctx, method, status, details };

    if (status === 429) {
      const retryAfter = payload.parameters?.retry_after;
      log.warn({ ...logCtx, retryAfter, errorCode: ErrorCode.DISPATCH_RATE_LIMITED, retryable: true }, 'Telegram rate limited');
      return err(createAppError(ErrorCode.DISPATCH_RATE_LIMITED, 'Telegram API rate limited', true, details));
    }

    if (isBlocked(status, details)) {
      log.warn({ ...logCtx, errorCode: ErrorCode.RECIPIENT_BLOCKED, retryable: false }, 'Recipient unreachable');
      return err(createAppError(ErrorCode.RECIPIENT_BLOCKED, 'Recipient blocked the bot or left the chat', false, details));
    }

    const retryable = status >= 500;
    log.error({ ...logCtx, errorCode: ErrorCode.DISPATCH_FAILED, retryable }, 'Telegram API call failed');
    return err(createAppError(ErrorCode.DISPATCH_FAILED, `Telegram ${method} returned ${status}`, retryable, details));
  }
}
