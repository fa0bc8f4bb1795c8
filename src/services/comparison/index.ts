import type {
  AggregateSavings,
  ComparisonResult,
  CurrentOfferSnapshot,
  OfferEntry,
  RateChange,
  Service,
  Tariff,
  TariffProfile,
} from '../../domain/types.js';
import { findElectricityOffer, findGasOffer } from '../offers/lookup.js';

interface FieldComparison {
  saving?: RateChange;
  worsened: boolean;
}

function compareField(before: number, after: number): FieldComparison {
  if (after < before) {
    return { saving: { before, after, delta: before - after }, worsened: false };
  }
  return { worsened: after > before };
}

export function hasImprovement(result: ComparisonResult): boolean {
  return result.energySaving !== undefined || result.commFeeSaving !== undefined;
}

export function hasWorsening(result: ComparisonResult): boolean {
  return result.energyWorsened || result.commFeeWorsened;
}

/**
 * Compares a subscribed tariff against the offer published for the same kind and
 * band. A missing offer is reported as unavailable, with no savings and no
 * worsened fields.
 */
export function compareTariff<S extends Service>(
  tariff: Tariff<S>,
  offer: OfferEntry | undefined,
): ComparisonResult<S> {
  if (!offer) {
    return {
      kind: tariff.kind,
      band: tariff.band,
      available: false,
      energyWorsened: false,
      commFeeWorsened: false,
      isMixed: false,
    };
  }

  const energy = compareField(tariff.energyRate, offer.energyRate);
  const fee = compareField(tariff.commercializationFee, offer.commercializationFee);

  const improved = energy.saving !== undefined || fee.saving !== undefined;
  const worsened = energy.worsened || fee.worsened;

  return {
    kind: tariff.kind,
    band: tariff.band,
    available: true,
    ...(energy.saving && { energySaving: energy.saving }),
    ...(fee.saving && { commFeeSaving: fee.saving }),
    energyWorsened: energy.worsened,
    commFeeWorsened: fee.worsened,
    isMixed: improved && worsened,
  };
}

export function evaluateSavings(
  profile: Pick<TariffProfile, 'electricity' | 'gas'>,
  snapshot: CurrentOfferSnapshot,
): AggregateSavings {
  const electricity = compareTariff(profile.electricity, findElectricityOffer(snapshot, profile.electricity));
  const gas = profile.gas ? compareTariff(profile.gas, findGasOffer(snapshot, profile.gas)) : undefined;

  const results: ComparisonResult[] = gas ? [electricity, gas] : [electricity];

  return {
    electricity,
    ...(gas && { gas }),
    hasSavings: results.some(hasImprovement),
    isMixed: results.some((result) => result.isMixed),
  };
}

export function resultFor(
  aggregate: AggregateSavings,
  service: Service,
): ComparisonResult | undefined {
  return service === 'electricity' ? aggregate.electricity : aggregate.gas;
}
