import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { Service, TariffFragment, TariffProfile } from '../../domain/types.js';
import type { TelegramCallbackQuery } from '../../domain/schemas.js';
import type { InlineKeyboard, MessagingChannel } from '../../infrastructure/messaging/types.js';
import { createUserLogger } from '../../infrastructure/logger.js';
import { findProfile, saveProfile, type ProfileStore } from '../profile/index.js';
import {
  applyPendingUpdate,
  clearPendingUpdate,
  loadPendingUpdate,
  type PendingUpdateStore,
} from '../pending-update/index.js';
import {
  ACCEPT_BUTTON_TEXT,
  CONFIRMED_TEXT,
  DECLINE_BUTTON_TEXT,
  DECLINED_TEXT,
  NOTHING_PENDING_TEXT,
  OUTDATED_TEXT,
  PROMPT_TEXT,
  UPDATE_FAILED_TEXT,
} from '../notification/messages.js';

export const CALLBACK_PREFIX = 'rate_update';

export type RateUpdateAction = 'accept' | 'decline';

export type RateUpdateOutcome =
  | { status: 'accepted'; profile: TariffProfile; services: Service[] }
  | { status: 'outdated' }
  | { status: 'declined' }
  | { status: 'nothing_pending' };

export interface RateUpdateDeps {
  profiles: ProfileStore;
  pendingUpdates: PendingUpdateStore;
}

export interface RateUpdateCallbackDeps extends RateUpdateDeps {
  channel: MessagingChannel;
}

export function callbackData(action: RateUpdateAction, userId: string): string {
  return `${CALLBACK_PREFIX}:${action}:${userId}`;
}

export function rateUpdateKeyboard(userId: string): InlineKeyboard {
  return [
    [
      { text: ACCEPT_BUTTON_TEXT, callbackData: callbackData('accept', userId) },
      { text: DECLINE_BUTTON_TEXT, callbackData: callbackData('decline', userId) },
    ],
  ];
}

const CALLBACK_PATTERN = /^rate_update:(accept|decline):(\d+)$/;

export function parseCallbackData(
  data: string | undefined,
): { action: RateUpdateAction; userId: string } | null {
  const match = data ? CALLBACK_PATTERN.exec(data) : null;
  if (!match) return null;

  const [, action, userId] = match;
  if (action !== 'accept' && action !== 'decline') return null;
  return { action, userId };
}

type UserLogger = ReturnType<typeof createUserLogger>;

/** Loads the slot; a row that fails validation is discarded and reads as empty. */
async function loadUsablePendingUpdate(
  deps: RateUpdateDeps,
  userId: string,
  log: UserLogger,
): Promise<Result<TariffFragment | null, AppError>> {
  const pending = await loadPendingUpdate(deps.pendingUpdates, userId);
  if (pending.ok || pending.error.code !== 'VALIDATION_ERROR') return pending;

  const cleared = await clearPendingUpdate(deps.pendingUpdates, userId);
  if (!cleared.ok) return cleared;

  log.warn({ errorCode: pending.error.code }, 'Unreadable pending update discarded');
  return ok(null);
}

/**
 * Applies the pending fragment to the user's live profile. The slot is only
 * cleared once the profile write succeeded, so a failed write can be retried
 * from the same button.
 */
export async function acceptPendingUpdate(
  deps: RateUpdateDeps,
  userId: string,
): Promise<Result<RateUpdateOutcome, AppError>> {
  const log = createUserLogger(userId, 'rate-update');

  const pending = await loadUsablePendingUpdate(deps, userId, log);
  if (!pending.ok) return pending;

  if (!pending.value) {
    log.info({ outcome: 'nothing_pending' }, 'Accept pressed without a pending update');
    return ok({ status: 'nothing_pending' });
  }

  const live = await findProfile(deps.profiles, userId);
  if (!live.ok) return live;

  if (!live.value) {
    const cleared = await clearPendingUpdate(deps.pendingUpdates, userId);
    if (!cleared.ok) {
      log.warn({ errorCode: cleared.error.code }, 'Orphaned pending update could not be cleared');
    }
    log.info({ outcome: 'nothing_pending' }, 'Pending update without a profile discarded');
    return ok({ status: 'nothing_pending' });
  }

  const merged = applyPendingUpdate(live.value, pending.value);
  if (merged.applied.length === 0) {
    const cleared = await clearPendingUpdate(deps.pendingUpdates, userId);
    if (!cleared.ok) return cleared;

    log.info({ outcome: 'outdated' }, 'Pending update no longer applies to any tariff');
    return ok({ status: 'outdated' });
  }

  const saved = await saveProfile(deps.profiles, merged.profile);
  if (!saved.ok) return saved;

  const cleared = await clearPendingUpdate(deps.pendingUpdates, userId);
  if (!cleared.ok) {
    log.warn({ errorCode: cleared.error.code }, 'Profile updated but pending update not cleared');
  }

  log.info({ outcome: 'accepted', services: merged.applied }, 'Pending update accepted');
  return ok({ status: 'accepted', profile: merged.profile, services: merged.applied });
}

export async function declinePendingUpdate(
  deps: RateUpdateDeps,
  userId: string,
): Promise<Result<RateUpdateOutcome, AppError>> {
  const log = createUserLogger(userId, 'rate-update');

  const pending = await loadUsablePendingUpdate(deps, userId, log);
  if (!pending.ok) return pending;

  if (!pending.value) {
    log.info({ outcome: 'nothing_pending' }, 'Decline pressed without a pending update');
    return ok({ status: 'nothing_pending' });
  }

  const cleared = await clearPendingUpdate(deps.pendingUpdates, userId);
  if (!cleared.ok) return cleared;

  log.info({ outcome: 'declined' }, 'Pending update declined');
  return ok({ status: 'declined' });
}

export function outcomeText(result: Result<RateUpdateOutcome, AppError>): string {
  if (!result.ok) return UPDATE_FAILED_TEXT;

  switch (result.value.status) {
    case 'accepted':
      return CONFIRMED_TEXT;
    case 'outdated':
      return OUTDATED_TEXT;
    case 'declined':
      return DECLINED_TEXT;
    case 'nothing_pending':
      return NOTHING_PENDING_TEXT;
  }
}

/** Swaps the question at the end of the notification for the answer. */
export function replacePrompt(original: string, replacement: string): string {
  if (original.includes(PROMPT_TEXT)) {
    return original.replace(PROMPT_TEXT, replacement);
  }
  return `${original}\n\n${replacement}`;
}

export type CallbackResult =
  | { handled: false }
  | { handled: true; action: RateUpdateAction; result: Result<RateUpdateOutcome, AppError> };

/**
 * Handles an Accept/Decline button press: runs the action, answers the callback
 * and rewrites the original message without its keyboard. Presses for another
 * user's buttons are answered and otherwise ignored.
 */
export async function handleRateUpdateCallback(
  deps: RateUpdateCallbackDeps,
  callback: TelegramCallbackQuery,
): Promise<CallbackResult> {
  const parsed = parseCallbackData(callback.data);
  if (!parsed) return { handled: false };

  const userId = String(callback.from.id);
  const log = createUserLogger(userId, 'rate-update');

  if (parsed.userId !== userId) {
    log.warn({ referencedUserId: parsed.userId }, 'Button pressed by a different user');
    await deps.channel.answerCallback(callback.id);
    return { handled: false };
  }

  const result =
    parsed.action === 'accept'
      ? await acceptPendingUpdate(deps, userId)
      : await declinePendingUpdate(deps, userId);

  if (!result.ok) {
    log.error(
      { errorCode: result.error.code, retryable: result.error.retryable, error: result.error.details },
      'Rate update failed',
    );
  }

  const text = outcomeText(result);
  await deps.channel.answerCallback(callback.id);

  const message = callback.message;
  const delivered =
    message?.text !== undefined
      ? await deps.channel.editMessage(String(message.chat.id), message.message_id, replacePrompt(message.text, text))
      : await deps.channel.send(userId, text);

  if (!delivered.ok) {
    log.warn({ errorCode: delivered.error.code }, 'Rate update answer not delivered');
  }

  return { handled: true, action: parsed.action, result };
}
