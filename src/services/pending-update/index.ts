import { ZodError } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type {
  CurrentOfferSnapshot,
  OfferEntry,
  Service,
  Tariff,
  TariffFragment,
  TariffProfile,
} from '../../domain/types.js';
import { findServiceOffer } from '../offers/lookup.js';
import type { PendingUpdateStore } from './types.js';

export type { PendingUpdateStore } from './types.js';
export { createPendingUpdateRepository } from './repository.js';

function withOfferPrices<S extends Service>(tariff: Tariff<S>, offer: OfferEntry): Tariff<S> {
  return {
    ...tariff,
    energyRate: offer.energyRate,
    commercializationFee: offer.commercializationFee,
  };
}

function copyTariff<S extends Service>(tariff: Tariff<S>): Tariff<S> {
  return {
    ...tariff,
    ...(tariff.consumption && { consumption: { ...tariff.consumption } }),
  };
}

/**
 * Builds the tariff change proposed to the user. Every subscribed service is
 * carried over with its consumption; selected services with a published offer
 * take the offer prices.
 */
export function buildPendingUpdate(
  profile: Pick<TariffProfile, 'electricity' | 'gas'>,
  snapshot: CurrentOfferSnapshot,
  updateServices: ReadonlySet<Service>,
  now: Date = new Date(),
): TariffFragment {
  const updatedServices: Service[] = [];

  let electricity = copyTariff(profile.electricity);
  const electricityOffer = findServiceOffer(snapshot, profile, 'electricity');
  if (updateServices.has('electricity') && electricityOffer) {
    electricity = withOfferPrices(electricity, electricityOffer);
    updatedServices.push('electricity');
  }

  let gas = profile.gas ? copyTariff(profile.gas) : undefined;
  const gasOffer = findServiceOffer(snapshot, profile, 'gas');
  if (gas && updateServices.has('gas') && gasOffer) {
    gas = withOfferPrices(gas, gasOffer);
    updatedServices.push('gas');
  }

  return {
    electricity,
    ...(gas && { gas }),
    updatedServices,
    createdAt: now,
  };
}

function sameSelection(live: Tariff, proposed: Tariff): boolean {
  return live.kind === proposed.kind && live.band === proposed.band;
}

export interface AppliedUpdate {
  profile: TariffProfile;
  applied: Service[];
}

/**
 * Merges an accepted fragment into the live profile. Only prices of the updated
 * services are taken, and only while the live tariff still has the kind and band
 * the offer was proposed for. Consumption and the notified snapshot stay live.
 * `applied` is empty when no service still matches.
 */
export function applyPendingUpdate(live: TariffProfile, fragment: TariffFragment): AppliedUpdate {
  const profile: TariffProfile = { ...live };
  const applied: Service[] = [];
  const skipped: Service[] = [];

  if (fragment.updatedServices.includes('electricity')) {
    if (sameSelection(live.electricity, fragment.electricity)) {
      profile.electricity = withOfferPrices(live.electricity, fragment.electricity);
      applied.push('electricity');
    } else {
      skipped.push('electricity');
    }
  }

  if (fragment.updatedServices.includes('gas')) {
    if (live.gas && fragment.gas && sameSelection(live.gas, fragment.gas)) {
      profile.gas = withOfferPrices(live.gas, fragment.gas);
      applied.push('gas');
    } else {
      skipped.push('gas');
    }
  }

  if (skipped.length > 0) {
    logger.warn({ userId: live.userId, skipped }, 'Pending update no longer matches the subscribed tariff');
  }
  logger.debug({ userId: live.userId, applied }, 'Pending update merged');

  return { profile, applied };
}

function persistenceError(message: string, error: unknown, userId: string): AppError {
  const details = errorMessage(error);
  logger.error({ userId, errorCode: 'DB_CONNECTION_ERROR', retryable: true, error: details }, message);
  return createAppError('DB_CONNECTION_ERROR', message, true, details);
}

// A stored row that no longer parses will not parse on a retry either.
function readError(message: string, error: unknown, userId: string): AppError {
  if (error instanceof ZodError) {
    logger.error({ userId, errorCode: 'VALIDATION_ERROR', retryable: false, error: error.message }, message);
    return createAppError('VALIDATION_ERROR', message, false, error.message);
  }
  return persistenceError(message, error, userId);
}

export async function savePendingUpdate(
  store: PendingUpdateStore,
  userId: string,
  fragment: TariffFragment,
): Promise<Result<TariffFragment, AppError>> {
  try {
    await store.save(userId, fragment);
    return ok(fragment);
  } catch (error) {
    return err(persistenceError('Failed to save pending update', error, userId));
  }
}

export async function loadPendingUpdate(
  store: PendingUpdateStore,
  userId: string,
): Promise<Result<TariffFragment | null, AppError>> {
  try {
    return ok(await store.load(userId));
  } catch (error) {
    return err(readError('Failed to load pending update', error, userId));
  }
}

export async function clearPendingUpdate(
  store: PendingUpdateStore,
  userId: string,
): Promise<Result<void, AppError>> {
  try {
    await store.clear(userId);
    return ok(undefined);
  } catch (error) {
    return err(persistenceError('Failed to clear pending update', error, userId));
  }
}
