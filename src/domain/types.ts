export const SERVICES = ['electricity', 'gas'] as const;

export type Service = (typeof SERVICES)[number];

export const TARIFF_KINDS = ['fixed', 'variable'] as const;

export type TariffKind = (typeof TARIFF_KINDS)[number];

export const BANDS = ['single', 'two_tier', 'three_tier'] as const;

export type Band = (typeof BANDS)[number];

export const GAS_BANDS = ['single', 'two_tier'] as const;

export type GasBand = Exclude<Band, 'three_tier'>;

export type BandFor<S extends Service> = S extends 'gas' ? GasBand : Band;

export const CONSUMPTION_SLOTS = ['f1', 'f2', 'f3', 'annual'] as const;

export type ConsumptionSlot = (typeof CONSUMPTION_SLOTS)[number];

/** Yearly consumption per time-of-use slot (kWh for electricity, Smc for gas). */
export type Consumption = Partial<Record<ConsumptionSlot, number>>;

/**
 * A subscribed tariff. `energyRate` is an absolute unit price for fixed tariffs
 * and a spread over the market index (PUN/PSV) for variable ones.
 */
export interface Tariff<S extends Service = Service> {
  kind: TariffKind;
  band: BandFor<S>;
  energyRate: number;
  commercializationFee: number;
  consumption?: Consumption;
}

export type ElectricityTariff = Tariff<'electricity'>;
export type GasTariff = Tariff<'gas'>;

export interface RatePair {
  energyRate: number;
  commercializationFee: number;
}

export interface NotifiedSnapshot {
  electricity?: RatePair;
  gas?: RatePair;
}

export interface TariffProfile {
  userId: string;
  electricity: ElectricityTariff;
  gas?: GasTariff;
  lastNotifiedSnapshot?: NotifiedSnapshot;
}

export interface OfferEntry extends RatePair {
  offerCode?: string;
}

export type OfferTable<S extends Service> = {
  [K in TariffKind]?: { [B in BandFor<S>]?: OfferEntry };
};

export interface CurrentOfferSnapshot {
  sourceDate?: string;
  electricity: OfferTable<'electricity'>;
  gas: OfferTable<'gas'>;
}

export interface RateChange {
  before: number;
  after: number;
  delta: number;
}

export interface ComparisonResult<S extends Service = Service> {
  kind: TariffKind;
  band: BandFor<S>;
  /** False when no offer is published for this exact kind and band. */
  available: boolean;
  energySaving?: RateChange;
  commFeeSaving?: RateChange;
  energyWorsened: boolean;
  commFeeWorsened: boolean;
  isMixed: boolean;
}

export interface AggregateSavings {
  electricity: ComparisonResult<'electricity'>;
  gas?: ComparisonResult<'gas'>;
  hasSavings: boolean;
  isMixed: boolean;
}

/**
 * Proposed tariff change awaiting the user's answer. Every subscribed service is
 * present; only those in `updatedServices` carry offer prices.
 */
export interface TariffFragment {
  electricity: ElectricityTariff;
  gas?: GasTariff;
  updatedServices: Service[];
  createdAt: Date;
}
