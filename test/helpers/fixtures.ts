import type { CurrentOfferSnapshot, TariffProfile } from '../../src/domain/types.js';

export function makeProfile(overrides: Partial<TariffProfile> = {}): TariffProfile {
  return {
    userId: '1001',
    electricity: { kind: 'fixed', band: 'single', energyRate: 0.145, commercializationFee: 72 },
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<CurrentOfferSnapshot> = {}): CurrentOfferSnapshot {
  return {
    sourceDate: '2026-10-01',
    electricity: {
      fixed: {
        single: { energyRate: 0.12, commercializationFee: 72 },
        two_tier: { energyRate: 0.13, commercializationFee: 60 },
      },
      variable: {
        single: { energyRate: 0.011, commercializationFee: 84 },
      },
    },
    gas: {
      fixed: { single: { energyRate: 0.4, commercializationFee: 90 } },
    },
    ...overrides,
  };
}
