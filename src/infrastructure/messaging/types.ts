import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface InlineButton {
  text: string;
  callbackData: string;
}

/** Rows of buttons shown under a message. */
export type InlineKeyboard = InlineButton[][];

export interface SentMessage {
  chatId: string;
  messageId: number;
}

export interface MessagingChannel {
  send(userId: string, text: string, keyboard?: InlineKeyboard): Promise<Result<SentMessage, AppError>>;
  answerCallback(callbackId: string, text?: string): Promise<Result<void, AppError>>;
  /** Replaces the text of a sent message and drops its keyboard. */
  editMessage(chatId: string, messageId: number, text: string): Promise<Result<void, AppError>>;
}
