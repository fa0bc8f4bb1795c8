import { eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { pendingUpdates } from '../../infrastructure/db/schema.js';
import { fragmentPayloadSchema } from '../../domain/schemas.js';
import type { TariffFragment } from '../../domain/types.js';
import type { PendingUpdateStore } from './types.js';

export function toTariffFragment(row: typeof pendingUpdates.$inferSelect): TariffFragment {
  const payload = fragmentPayloadSchema.parse(row.fragment);

  return {
    electricity: payload.electricity,
    ...(payload.gas && { gas: payload.gas }),
    updatedServices: payload.updatedServices,
    createdAt: row.createdAt,
  };
}

export function createPendingUpdateRepository(db: Database): PendingUpdateStore {
  return {
    async save(userId, fragment) {
      const payload = {
        electricity: fragment.electricity,
        gas: fragment.gas,
        updatedServices: fragment.updatedServices,
      };

      await db
        .insert(pendingUpdates)
        .values({ userId, fragment: payload, createdAt: fragment.createdAt })
        .onConflictDoUpdate({
          target: pendingUpdates.userId,
          set: { fragment: payload, createdAt: fragment.createdAt, updatedAt: new Date() },
        });
    },

    async load(userId) {
      const rows = await db
        .select()
        .from(pendingUpdates)
        .where(eq(pendingUpdates.userId, userId));

      return rows.length > 0 ? toTariffFragment(rows[0]) : null;
    },

    async clear(userId) {
      await db.delete(pendingUpdates).where(eq(pendingUpdates.userId, userId));
    },
  };
}
