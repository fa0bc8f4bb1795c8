import type {
  AggregateSavings,
  Band,
  ConsumptionSlot,
  CurrentOfferSnapshot,
  OfferEntry,
  Service,
  Tariff,
  TariffProfile,
} from '../../domain/types.js';
import { SERVICES } from '../../domain/types.js';
import { hasImprovement, resultFor } from '../comparison/index.js';
import { findServiceOffer } from '../offers/lookup.js';

export type SavingsEstimates = Partial<Record<Service, number>>;

const ELECTRICITY_SLOTS: Record<Band, readonly ConsumptionSlot[]> = {
  single: ['f1'],
  two_tier: ['f1', 'f2'],
  three_tier: ['f1', 'f2', 'f3'],
};

const GAS_SLOTS: readonly ConsumptionSlot[] = ['annual'];

export function consumptionSlotsFor(service: Service, band: Band): readonly ConsumptionSlot[] {
  return service === 'electricity' ? ELECTRICITY_SLOTS[band] : GAS_SLOTS;
}

/** Total yearly consumption, or undefined unless every slot of the band is filled in. */
export function totalConsumption(service: Service, tariff: Tariff): number | undefined {
  const consumption = tariff.consumption;
  if (!consumption) return undefined;

  let total = 0;
  for (const slot of consumptionSlotsFor(service, tariff.band)) {
    const value = consumption[slot];
    if (value === undefined) return undefined;
    total += value;
  }
  return total;
}

/**
 * Yearly cost difference of moving to the offer, positive when the offer is
 * cheaper. Needs the user's consumption; undefined without it.
 */
export function estimateAnnualSavings(
  service: Service,
  tariff: Tariff,
  offer: OfferEntry | undefined,
): number | undefined {
  if (!offer) return undefined;

  const consumption = totalConsumption(service, tariff);
  if (consumption === undefined) return undefined;

  const energy = (tariff.energyRate - offer.energyRate) * consumption;
  const fee = tariff.commercializationFee - offer.commercializationFee;
  return energy + fee;
}

export function estimateProfileSavings(
  profile: Pick<TariffProfile, 'electricity' | 'gas'>,
  snapshot: CurrentOfferSnapshot,
): SavingsEstimates {
  const estimates: SavingsEstimates = {};

  const electricity = estimateAnnualSavings(
    'electricity',
    profile.electricity,
    findServiceOffer(snapshot, profile, 'electricity'),
  );
  if (electricity !== undefined) estimates.electricity = electricity;

  if (profile.gas) {
    const gas = estimateAnnualSavings('gas', profile.gas, findServiceOffer(snapshot, profile, 'gas'));
    if (gas !== undefined) estimates.gas = gas;
  }

  return estimates;
}

/**
 * Services worth proposing: at least one field improved, and not a mixed outcome
 * that the user's own consumption shows to be more expensive overall.
 */
export function selectUpdateServices(
  aggregate: AggregateSavings,
  estimates: SavingsEstimates,
): ReadonlySet<Service> {
  const selected = new Set<Service>();

  for (const service of SERVICES) {
    const result = resultFor(aggregate, service);
    if (!result || !hasImprovement(result)) continue;

    const estimate = estimates[service];
    if (result.isMixed && estimate !== undefined && estimate <= 0) continue;

    selected.add(service);
  }

  return selected;
}
