import { desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from '../../infrastructure/db/client.js';
import { offerRates } from '../../infrastructure/db/schema.js';
import { BANDS, GAS_BANDS, TARIFF_KINDS } from '../../domain/types.js';
import type { CurrentOfferSnapshot, OfferEntry } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { OfferSnapshotProvider } from './types.js';

const log = logger.child({ module: 'offer-repository' });

const offerSelectionSchema = z.discriminatedUnion('service', [
  z.object({ service: z.literal('electricity'), kind: z.enum(TARIFF_KINDS), band: z.enum(BANDS) }),
  z.object({ service: z.literal('gas'), kind: z.enum(TARIFF_KINDS), band: z.enum(GAS_BANDS) }),
]);

function toOfferEntry(row: typeof offerRates.$inferSelect): OfferEntry {
  return {
    energyRate: row.energyRate,
    commercializationFee: row.commercializationFee,
    ...(row.offerCode !== null && { offerCode: row.offerCode }),
  };
}

export function toOfferSnapshot(
  sourceDate: string,
  rows: Array<typeof offerRates.$inferSelect>,
): CurrentOfferSnapshot {
  const snapshot: CurrentOfferSnapshot = { sourceDate, electricity: {}, gas: {} };

  for (const row of rows) {
    const selection = offerSelectionSchema.safeParse(row);
    if (!selection.success) {
      log.warn({ offerId: row.id, service: row.service, kind: row.kind, band: row.band }, 'Skipping offer with unknown selection');
      continue;
    }

    const entry = toOfferEntry(row);
    const { data } = selection;
    if (data.service === 'electricity') {
      const bands = (snapshot.electricity[data.kind] ??= {});
      bands[data.band] = entry;
    } else {
      const bands = (snapshot.gas[data.kind] ??= {});
      bands[data.band] = entry;
    }
  }

  return snapshot;
}

/** Serves the offers of the most recent registry publication. */
export function createOfferRepository(db: Database): OfferSnapshotProvider {
  return {
    async getCurrentSnapshot() {
      const latest = await db
        .select({ sourceDate: offerRates.sourceDate })
        .from(offerRates)
        .orderBy(desc(offerRates.sourceDate))
        .limit(1);

      if (latest.length === 0) return null;

      const sourceDate = latest[0].sourceDate;
      const rows = await db
        .select()
        .from(offerRates)
        .where(eq(offerRates.sourceDate, sourceDate));

      return toOfferSnapshot(sourceDate, rows);
    },
  };
}
