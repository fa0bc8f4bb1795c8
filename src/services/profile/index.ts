import { ZodError } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { NotifiedSnapshot, TariffProfile } from '../../domain/types.js';
import type { ProfileStore } from './types.js';

export type { ProfileStore } from './types.js';
export { createProfileRepository } from './repository.js';

function persistenceError(message: string, error: unknown, context: Record<string, unknown>): AppError {
  const details = errorMessage(error);
  logger.error({ ...context, errorCode: 'DB_CONNECTION_ERROR', retryable: true, error: details }, message);
  return createAppError('DB_CONNECTION_ERROR', message, true, details);
}

function readError(message: string, error: unknown, context: Record<string, unknown>): AppError {
  if (error instanceof ZodError) {
    logger.error({ ...context, errorCode: 'VALIDATION_ERROR', retryable: false, error: error.message }, message);
    return createAppError('VALIDATION_ERROR', message, false, error.message);
  }
  return persistenceError(message, error, context);
}

export async function findProfile(
  store: ProfileStore,
  userId: string,
): Promise<Result<TariffProfile | null, AppError>> {
  try {
    return ok(await store.get(userId));
  } catch (error) {
    return err(readError('Failed to fetch profile', error, { userId }));
  }
}

export async function getProfile(
  store: ProfileStore,
  userId: string,
): Promise<Result<TariffProfile, AppError>> {
  const result = await findProfile(store, userId);
  if (!result.ok) return result;

  if (!result.value) {
    return err(createAppError('PROFILE_NOT_FOUND', `Profile for user '${userId}' not found`, false));
  }
  return ok(result.value);
}

export async function listProfiles(
  store: ProfileStore,
): Promise<Result<TariffProfile[], AppError>> {
  try {
    return ok(await store.list());
  } catch (error) {
    return err(persistenceError('Failed to list profiles', error, {}));
  }
}

export async function saveProfile(
  store: ProfileStore,
  profile: TariffProfile,
): Promise<Result<TariffProfile, AppError>> {
  try {
    await store.put(profile);
    return ok(profile);
  } catch (error) {
    return err(persistenceError('Failed to save profile', error, { userId: profile.userId }));
  }
}

/**
 * Stores the snapshot the user was just notified about on the live profile, so a
 * tariff edited meanwhile is not overwritten with the copy read by the sweep.
 */
export async function recordNotifiedSnapshot(
  store: ProfileStore,
  userId: string,
  snapshot: NotifiedSnapshot,
): Promise<Result<TariffProfile, AppError>> {
  const live = await getProfile(store, userId);
  if (!live.ok) return live;

  return saveProfile(store, { ...live.value, lastNotifiedSnapshot: snapshot });
}
