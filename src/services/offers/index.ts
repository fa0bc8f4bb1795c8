import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { CurrentOfferSnapshot } from '../../domain/types.js';
import type { OfferSnapshotProvider } from './types.js';
import { isSnapshotEmpty } from './lookup.js';

export type { OfferSnapshotProvider } from './types.js';
export { createOfferRepository } from './repository.js';
export { findElectricityOffer, findGasOffer, findServiceOffer } from './lookup.js';

export async function loadCurrentOffers(
  provider: OfferSnapshotProvider,
): Promise<Result<CurrentOfferSnapshot, AppError>> {
  let snapshot: CurrentOfferSnapshot | null;
  try {
    snapshot = await provider.getCurrentSnapshot();
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ errorCode: 'DB_CONNECTION_ERROR', retryable: true, error: message }, 'Failed to load current offers');
    return err(createAppError('DB_CONNECTION_ERROR', 'Failed to load current offers', true, message));
  }

  if (!snapshot || isSnapshotEmpty(snapshot)) {
    logger.warn('No published offers available');
    return err(createAppError('OFFERS_UNAVAILABLE', 'No published offers available', true));
  }

  return ok(snapshot);
}
