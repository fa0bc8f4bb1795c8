import 'dotenv/config';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { errorMessage } from '../src/domain/errors.js';
import { logger } from '../src/infrastructure/logger.js';
import { offerRates } from '../src/infrastructure/db/schema.js';
import type { Band, Service, TariffKind } from '../src/domain/types.js';

interface OfferSeed {
  service: Service;
  kind: TariffKind;
  band: Band;
  energyRate: number;
  commercializationFee: number;
  offerCode?: string;
}

const OFFERS: OfferSeed[] = [
  { service: 'electricity', kind: 'fixed', band: 'single', energyRate: 0.119, commercializationFee: 60, offerCode: 'EL-FIX-MONO' },
  { service: 'electricity', kind: 'fixed', band: 'two_tier', energyRate: 0.124, commercializationFee: 60 },
  { service: 'electricity', kind: 'fixed', band: 'three_tier', energyRate: 0.127, commercializationFee: 60 },
  { service: 'electricity', kind: 'variable', band: 'single', energyRate: 0.012, commercializationFee: 72, offerCode: 'EL-VAR-MONO' },
  { service: 'electricity', kind: 'variable', band: 'two_tier', energyRate: 0.014, commercializationFee: 72 },
  { service: 'electricity', kind: 'variable', band: 'three_tier', energyRate: 0.015, commercializationFee: 72 },
  { service: 'gas', kind: 'fixed', band: 'single', energyRate: 0.42, commercializationFee: 84, offerCode: 'GAS-FIX' },
  { service: 'gas', kind: 'variable', band: 'single', energyRate: 0.09, commercializationFee: 96 },
];

async function main(): Promise<void> {
  logger.info('Starting database seed');

  const db = createDatabase();
  const sourceDate = new Date().toISOString().slice(0, 10);

  try {
    const rows = await db
      .insert(offerRates)
      .values(OFFERS.map((offer) => ({ ...offer, sourceDate, offerCode: offer.offerCode ?? null })))
      .onConflictDoNothing()
      .returning({ id: offerRates.id });

    logger.info({ sourceDate, inserted: rows.length }, 'Offers seeded');
  } catch (error) {
    logger.error({ error: errorMessage(error), step: 'seed' }, 'Seed failed');
    process.exitCode = 1;
  }
}

await main();
