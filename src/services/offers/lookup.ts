import type {
  CurrentOfferSnapshot,
  ElectricityTariff,
  GasTariff,
  OfferEntry,
  Service,
  TariffProfile,
} from '../../domain/types.js';

// Offers are always looked up with the tariff's own kind and band.
export function findElectricityOffer(
  snapshot: CurrentOfferSnapshot,
  tariff: ElectricityTariff,
): OfferEntry | undefined {
  return snapshot.electricity[tariff.kind]?.[tariff.band];
}

export function findGasOffer(
  snapshot: CurrentOfferSnapshot,
  tariff: GasTariff,
): OfferEntry | undefined {
  return snapshot.gas[tariff.kind]?.[tariff.band];
}

export function findServiceOffer(
  snapshot: CurrentOfferSnapshot,
  profile: Pick<TariffProfile, 'electricity' | 'gas'>,
  service: Service,
): OfferEntry | undefined {
  if (service === 'electricity') {
    return findElectricityOffer(snapshot, profile.electricity);
  }
  return profile.gas ? findGasOffer(snapshot, profile.gas) : undefined;
}

export function isSnapshotEmpty(snapshot: CurrentOfferSnapshot): boolean {
  const tables = [snapshot.electricity, snapshot.gas];
  return tables.every((table) =>
    Object.values(table).every((bands) => bands === undefined || Object.keys(bands).length === 0),
  );
}
