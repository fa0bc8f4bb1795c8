import { eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { userProfiles } from '../../infrastructure/db/schema.js';
import {
  electricityTariffSchema,
  gasTariffSchema,
  notifiedSnapshotSchema,
} from '../../domain/schemas.js';
import { errorMessage } from '../../domain/errors.js';
import type { TariffProfile } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { ProfileStore } from './types.js';

const log = logger.child({ module: 'profile-repository' });

export function toTariffProfile(row: typeof userProfiles.$inferSelect): TariffProfile {
  const electricity = electricityTariffSchema.parse(row.electricity);
  const gas = row.gas === null ? undefined : gasTariffSchema.parse(row.gas);
  const lastNotifiedSnapshot =
    row.lastNotifiedSnapshot === null
      ? undefined
      : notifiedSnapshotSchema.parse(row.lastNotifiedSnapshot);

  return {
    userId: row.userId,
    electricity,
    ...(gas && { gas }),
    ...(lastNotifiedSnapshot && { lastNotifiedSnapshot }),
  };
}

export function createProfileRepository(db: Database): ProfileStore {
  return {
    async get(userId) {
      const rows = await db
        .select()
        .from(userProfiles)
        .where(eq(userProfiles.userId, userId));

      return rows.length > 0 ? toTariffProfile(rows[0]) : null;
    },

    async list() {
      const rows = await db.select().from(userProfiles);

      const profiles: TariffProfile[] = [];
      for (const row of rows) {
        try {
          profiles.push(toTariffProfile(row));
        } catch (error) {
          log.warn({ userId: row.userId, error: errorMessage(error) }, 'Skipping profile with invalid stored tariff');
        }
      }
      return profiles;
    },

    async put(profile) {
      const values = {
        electricity: profile.electricity,
        gas: profile.gas ?? null,
        lastNotifiedSnapshot: profile.lastNotifiedSnapshot ?? null,
      };

      await db
        .insert(userProfiles)
        .values({ userId: profile.userId, ...values })
        .onConflictDoUpdate({
          target: userProfiles.userId,
          set: { ...values, updatedAt: new Date() },
        });
    },
  };
}
