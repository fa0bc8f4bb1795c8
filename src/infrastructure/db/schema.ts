import {
  pgTable,
  uuid,
  text,
  timestamp,
  jsonb,
  doublePrecision,
  date,
  uniqueIndex,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const userProfiles = pgTable('user_profiles', {
  userId: text('user_id').primaryKey(),
  electricity: jsonb('electricity').notNull(),
  gas: jsonb('gas'),
  lastNotifiedSnapshot: jsonb('last_notified_snapshot'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const pendingUpdates = pgTable('pending_updates', {
  userId: text('user_id')
    .primaryKey()
    .references(() => userProfiles.userId, { onDelete: 'cascade' }),
  fragment: jsonb('fragment').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const offerRates = pgTable(
  'offer_rates',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sourceDate: date('source_date', { mode: 'string' }).notNull(),
    service: text('service').notNull(),
    kind: text('kind').notNull(),
    band: text('band').notNull(),
    energyRate: doublePrecision('energy_rate').notNull(),
    commercializationFee: doublePrecision('commercialization_fee').notNull(),
    offerCode: text('offer_code'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('idx_offer_rates_source_selection').on(
      table.sourceDate,
      table.service,
      table.kind,
      table.band,
    ),
    index('idx_offer_rates_source_date').on(table.sourceDate),
    check('offer_rates_service_check', sql`service IN ('electricity', 'gas')`),
    check('offer_rates_kind_check', sql`kind IN ('fixed', 'variable')`),
    check(
      'offer_rates_band_check',
      sql`band IN ('single', 'two_tier', 'three_tier') AND NOT (service = 'gas' AND band = 'three_tier')`,
    ),
  ],
);
