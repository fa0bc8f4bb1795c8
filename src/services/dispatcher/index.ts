import { ok, type Result } from '../../domain/result.js';
import { errorMessage, type AppError } from '../../domain/errors.js';
import type { CurrentOfferSnapshot, TariffProfile } from '../../domain/types.js';
import type { MessagingChannel } from '../../infrastructure/messaging/types.js';
import { createUserLogger, logger } from '../../infrastructure/logger.js';
import { evaluateSavings } from '../comparison/index.js';
import { buildNotifiedSnapshot, shouldNotify } from '../notification/gate.js';
import { estimateProfileSavings, selectUpdateServices } from '../notification/estimate.js';
import { formatNotification } from '../notification/format.js';
import { loadCurrentOffers, type OfferSnapshotProvider } from '../offers/index.js';
import { listProfiles, recordNotifiedSnapshot, type ProfileStore } from '../profile/index.js';
import { buildPendingUpdate, savePendingUpdate, type PendingUpdateStore } from '../pending-update/index.js';
import { rateUpdateKeyboard } from '../rate-update/index.js';

export const DEFAULT_CONCURRENCY = 10;

const log = logger.child({ module: 'dispatcher' });

export type DispatchOutcome = 'no_savings' | 'already_notified' | 'not_convenient' | 'notified' | 'failed';

export interface UserDispatchResult {
  userId: string;
  outcome: DispatchOutcome;
}

export interface CycleSummary {
  usersChecked: number;
  notified: number;
  skipped: number;
  failed: number;
}

export interface DispatcherDeps {
  profiles: ProfileStore;
  offers: OfferSnapshotProvider;
  pendingUpdates: PendingUpdateStore;
  channel: MessagingChannel;
  now?: () => Date;
}

export interface CycleOptions {
  concurrency?: number;
}

function resultOf(userId: string, outcome: DispatchOutcome): UserDispatchResult {
  return { userId, outcome };
}

export async function notifyUser(
  deps: DispatcherDeps,
  profile: TariffProfile,
  snapshot: CurrentOfferSnapshot,
): Promise<UserDispatchResult> {
  const { userId } = profile;
  const userLog = createUserLogger(userId, 'dispatcher');

  const aggregate = evaluateSavings(profile, snapshot);
  if (!aggregate.hasSavings) return resultOf(userId, 'no_savings');

  const proposed = buildNotifiedSnapshot(profile, aggregate, snapshot);
  if (!shouldNotify(profile, aggregate, proposed)) return resultOf(userId, 'already_notified');

  const estimates = estimateProfileSavings(profile, snapshot);
  const updateServices = selectUpdateServices(aggregate, estimates);
  if (updateServices.size === 0) {
    userLog.debug({ estimates }, 'Savings offset by the worsened component');
    return resultOf(userId, 'not_convenient');
  }

  const fragment = buildPendingUpdate(profile, snapshot, updateServices, deps.now?.());
  const saved = await savePendingUpdate(deps.pendingUpdates, userId, fragment);
  if (!saved.ok) return resultOf(userId, 'failed');

  const text = formatNotification({ profile, aggregate, snapshot, updateServices, estimates });
  const sent = await deps.channel.send(userId, text, rateUpdateKeyboard(userId));

  // Not sent: the snapshot stays, so the user is reconsidered next cycle.
  if (!sent.ok) {
    userLog.warn(
      { outcome: 'failed', errorCode: sent.error.code, retryable: sent.error.retryable },
      'Notification not delivered',
    );
    return resultOf(userId, 'failed');
  }

  const recorded = await recordNotifiedSnapshot(deps.profiles, userId, proposed);
  if (!recorded.ok) {
    // The message is out; the next cycle may send it again.
    userLog.error({ errorCode: recorded.error.code }, 'Notified snapshot not recorded');
  }

  userLog.info({ outcome: 'notified', services: fragment.updatedServices }, 'User notified');
  return resultOf(userId, 'notified');
}

/** Runs `task` over `items` with at most `concurrency` calls in flight. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  }

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}

export function summarize(results: readonly UserDispatchResult[]): CycleSummary {
  const summary: CycleSummary = { usersChecked: results.length, notified: 0, skipped: 0, failed: 0 };

  for (const result of results) {
    if (result.outcome === 'notified') summary.notified++;
    else if (result.outcome === 'failed') summary.failed++;
    else summary.skipped++;
  }

  return summary;
}

/**
 * One notification sweep over all profiles against the current offers. A user's
 * failure never stops the others; the cycle itself fails only when offers or
 * profiles cannot be read.
 */
export async function runNotificationCycle(
  deps: DispatcherDeps,
  options: CycleOptions = {},
): Promise<Result<CycleSummary, AppError>> {
  const startTime = Date.now();

  const snapshot = await loadCurrentOffers(deps.offers);
  if (!snapshot.ok) {
    log.error({ errorCode: snapshot.error.code }, 'Notification cycle aborted: no offers');
    return snapshot;
  }

  const profiles = await listProfiles(deps.profiles);
  if (!profiles.ok) return profiles;

  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  log.info(
    { users: profiles.value.length, concurrency, sourceDate: snapshot.value.sourceDate },
    'Notification cycle started',
  );

  const results = await mapWithConcurrency(profiles.value, concurrency, async (profile) => {
    try {
      return await notifyUser(deps, profile, snapshot.value);
    } catch (error) {
      createUserLogger(profile.userId, 'dispatcher').error(
        { outcome: 'failed', error: errorMessage(error) },
        'Unexpected error while notifying user',
      );
      return resultOf(profile.userId, 'failed');
    }
  });

  const summary = summarize(results);
  log.info({ ...summary, durationMs: Date.now() - startTime }, 'Notification cycle finished');
  return ok(summary);
}
