import { z } from 'zod';
import { ok, err, type Result } from '../../src/domain/result.js';
import { createAppError, type AppError } from '../../src/domain/errors.js';
import type { CurrentOfferSnapshot, TariffFragment, TariffProfile } from '../../src/domain/types.js';
import type { ProfileStore } from '../../src/services/profile/types.js';
import type { PendingUpdateStore } from '../../src/services/pending-update/types.js';
import type { OfferSnapshotProvider } from '../../src/services/offers/types.js';
import type { InlineKeyboard, MessagingChannel, SentMessage } from '../../src/infrastructure/messaging/types.js';

export class InMemoryProfileStore implements ProfileStore {
  readonly profiles = new Map<string, TariffProfile>();
  failPut = false;

  constructor(initial: TariffProfile[] = []) {
    for (const profile of initial) this.profiles.set(profile.userId, structuredClone(profile));
  }

  async get(userId: string): Promise<TariffProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? structuredClone(profile) : null;
  }

  async list(): Promise<TariffProfile[]> {
    return [...this.profiles.values()].map((profile) => structuredClone(profile));
  }

  async put(profile: TariffProfile): Promise<void> {
    if (this.failPut) throw new Error('connection reset');
    this.profiles.set(profile.userId, structuredClone(profile));
  }
}

export class InMemoryPendingUpdateStore implements PendingUpdateStore {
  readonly fragments = new Map<string, TariffFragment>();
  /** Users whose stored row fails validation on load. */
  readonly corrupt = new Set<string>();
  failSave = false;

  async save(userId: string, fragment: TariffFragment): Promise<void> {
    if (this.failSave) throw new Error('connection reset');
    this.fragments.set(userId, structuredClone(fragment));
  }

  async load(userId: string): Promise<TariffFragment | null> {
    if (this.corrupt.has(userId)) {
      z.array(z.enum(['electricity', 'gas'])).parse(['water']);
    }
    const fragment = this.fragments.get(userId);
    return fragment ? structuredClone(fragment) : null;
  }

  async clear(userId: string): Promise<void> {
    this.corrupt.delete(userId);
    this.fragments.delete(userId);
  }
}

export class StaticOfferProvider implements OfferSnapshotProvider {
  constructor(private readonly snapshot: CurrentOfferSnapshot | null) {}

  async getCurrentSnapshot(): Promise<CurrentOfferSnapshot | null> {
    return this.snapshot;
  }
}

export interface SentRecord {
  userId: string;
  text: string;
  keyboard?: InlineKeyboard;
}

export interface EditRecord {
  chatId: string;
  messageId: number;
  text: string;
}

/** Records every call; `failures` maps a user id to the error its sends return. */
export class FakeChannel implements MessagingChannel {
  readonly sent: SentRecord[] = [];
  readonly answered: Array<{ callbackId: string; text?: string }> = [];
  readonly edited: EditRecord[] = [];
  readonly failures = new Map<string, AppError>();
  sendDelayMs = 0;
  inFlight = 0;
  maxInFlight = 0;

  async send(userId: string, text: string, keyboard?: InlineKeyboard): Promise<Result<SentMessage, AppError>> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.sendDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.sendDelayMs));
      }
      const failure = this.failures.get(userId);
      if (failure) return err(failure);

      this.sent.push({ userId, text, keyboard });
      return ok({ chatId: userId, messageId: this.sent.length });
    } finally {
      this.inFlight--;
    }
  }

  async answerCallback(callbackId: string, text?: string): Promise<Result<void, AppError>> {
    this.answered.push({ callbackId, text });
    return ok(undefined);
  }

  async editMessage(chatId: string, messageId: number, text: string): Promise<Result<void, AppError>> {
    this.edited.push({ chatId, messageId, text });
    return ok(undefined);
  }
}

export const blockedError = createAppError('RECIPIENT_BLOCKED', 'Recipient blocked the bot or left the chat', false);
export const timeoutError = createAppError('DISPATCH_TIMEOUT', 'Telegram sendMessage timed out', true);
