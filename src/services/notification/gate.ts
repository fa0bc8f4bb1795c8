import type {
  AggregateSavings,
  CurrentOfferSnapshot,
  NotifiedSnapshot,
  RatePair,
  TariffProfile,
} from '../../domain/types.js';
import { SERVICES } from '../../domain/types.js';
import { hasImprovement, resultFor } from '../comparison/index.js';
import { findServiceOffer } from '../offers/lookup.js';

/**
 * Offer prices the user would be notified about: one entry per service that has
 * at least one saving. Services without savings stay out of the snapshot.
 */
export function buildNotifiedSnapshot(
  profile: Pick<TariffProfile, 'electricity' | 'gas'>,
  aggregate: AggregateSavings,
  snapshot: CurrentOfferSnapshot,
): NotifiedSnapshot {
  const proposed: NotifiedSnapshot = {};

  for (const service of SERVICES) {
    const result = resultFor(aggregate, service);
    if (!result || !hasImprovement(result)) continue;

    const offer = findServiceOffer(snapshot, profile, service);
    if (!offer) continue;

    proposed[service] = {
      energyRate: offer.energyRate,
      commercializationFee: offer.commercializationFee,
    };
  }

  return proposed;
}

function ratePairsEqual(a: RatePair | undefined, b: RatePair | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.energyRate === b.energyRate && a.commercializationFee === b.commercializationFee;
}

export function snapshotsEqual(
  a: NotifiedSnapshot | undefined,
  b: NotifiedSnapshot | undefined,
): boolean {
  if (a === undefined || b === undefined) return a === b;
  return SERVICES.every((service) => ratePairsEqual(a[service], b[service]));
}

// Only the most recent notified snapshot is the deduplication key.
export function shouldNotify(
  profile: Pick<TariffProfile, 'lastNotifiedSnapshot'>,
  aggregate: AggregateSavings,
  proposedSnapshot: NotifiedSnapshot,
): boolean {
  if (!aggregate.hasSavings) return false;
  return !snapshotsEqual(proposedSnapshot, profile.lastNotifiedSnapshot);
}
