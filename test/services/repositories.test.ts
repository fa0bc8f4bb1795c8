import { describe, it, expect } from 'vitest';
import { toOfferSnapshot } from '../../src/services/offers/repository.js';
import { toTariffProfile } from '../../src/services/profile/repository.js';
import { toTariffFragment } from '../../src/services/pending-update/repository.js';
import { loadCurrentOffers } from '../../src/services/offers/index.js';
import { findProfile } from '../../src/services/profile/index.js';
import { StaticOfferProvider } from '../helpers/in-memory-stores.js';
import { makeSnapshot } from '../helpers/fixtures.js';

const CREATED = new Date('2026-10-01T06:00:00Z');

function offerRow(service: string, kind: string, band: string, energyRate: number, offerCode: string | null = null) {
  return {
    id: `${service}-${kind}-${band}`,
    sourceDate: '2026-10-01',
    service,
    kind,
    band,
    energyRate,
    commercializationFee: 60,
    offerCode,
    createdAt: CREATED,
  };
}

describe('toOfferSnapshot', () => {
  it('groups rows by service, kind and band', () => {
    const snapshot = toOfferSnapshot('2026-10-01', [
      offerRow('electricity', 'fixed', 'single', 0.12, 'EL-1'),
      offerRow('electricity', 'variable', 'three_tier', 0.015),
      offerRow('gas', 'fixed', 'single', 0.4),
    ]);

    expect(snapshot).toEqual({
      sourceDate: '2026-10-01',
      electricity: {
        fixed: { single: { energyRate: 0.12, commercializationFee: 60, offerCode: 'EL-1' } },
        variable: { three_tier: { energyRate: 0.015, commercializationFee: 60 } },
      },
      gas: {
        fixed: { single: { energyRate: 0.4, commercializationFee: 60 } },
      },
    });
  });

  it('skips rows with an unknown selection', () => {
    const snapshot = toOfferSnapshot('2026-10-01', [
      offerRow('gas', 'fixed', 'three_tier', 0.4),
      offerRow('water', 'fixed', 'single', 1),
      offerRow('electricity', 'indexed', 'single', 0.1),
    ]);

    expect(snapshot).toEqual({ sourceDate: '2026-10-01', electricity: {}, gas: {} });
  });
});

describe('toTariffProfile', () => {
  const base = { userId: '1001', createdAt: CREATED, updatedAt: CREATED };

  it('validates the jsonb columns', () => {
    const profile = toTariffProfile({
      ...base,
      electricity: { kind: 'fixed', band: 'two_tier', energyRate: 0.13, commercializationFee: 60, consumption: { f1: 900, f2: 700 } },
      gas: null,
      lastNotifiedSnapshot: { electricity: { energyRate: 0.12, commercializationFee: 60 } },
    });

    expect(profile).toEqual({
      userId: '1001',
      electricity: { kind: 'fixed', band: 'two_tier', energyRate: 0.13, commercializationFee: 60, consumption: { f1: 900, f2: 700 } },
      lastNotifiedSnapshot: { electricity: { energyRate: 0.12, commercializationFee: 60 } },
    });
    expect('gas' in profile).toBe(false);
  });

  it('rejects a three-tier gas tariff', () => {
    expect(() =>
      toTariffProfile({
        ...base,
        electricity: { kind: 'fixed', band: 'single', energyRate: 0.13, commercializationFee: 60 },
        gas: { kind: 'fixed', band: 'three_tier', energyRate: 0.4, commercializationFee: 90 },
        lastNotifiedSnapshot: null,
      }),
    ).toThrow();
  });
});

describe('findProfile', () => {
  it('reports a stored profile that fails validation as not retryable', async () => {
    const result = await findProfile(
      {
        get: async (userId) =>
          toTariffProfile({
            userId,
            electricity: { kind: 'fixed', band: 'single', energyRate: 'cheap' },
            gas: null,
            lastNotifiedSnapshot: null,
            createdAt: CREATED,
            updatedAt: CREATED,
          }),
        list: async () => [],
        put: async () => {},
      },
      '1001',
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('VALIDATION_ERROR');
    expect(result.error.retryable).toBe(false);
  });
});

describe('toTariffFragment', () => {
  it('restores the fragment with its creation time', () => {
    const fragment = toTariffFragment({
      userId: '1001',
      fragment: {
        electricity: { kind: 'variable', band: 'single', energyRate: 0.011, commercializationFee: 84 },
        updatedServices: ['electricity'],
      },
      createdAt: CREATED,
      updatedAt: CREATED,
    });

    expect(fragment).toEqual({
      electricity: { kind: 'variable', band: 'single', energyRate: 0.011, commercializationFee: 84 },
      updatedServices: ['electricity'],
      createdAt: CREATED,
    });
  });
});

describe('loadCurrentOffers', () => {
  it('returns the published snapshot', async () => {
    const result = await loadCurrentOffers(new StaticOfferProvider(makeSnapshot()));

    expect(result.ok && result.value.sourceDate).toBe('2026-10-01');
  });

  it('maps a failing provider to a persistence error', async () => {
    const result = await loadCurrentOffers({
      getCurrentSnapshot: async () => {
        throw new Error('socket hang up');
      },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DB_CONNECTION_ERROR');
    expect(result.error.details).toBe('socket hang up');
  });
});
