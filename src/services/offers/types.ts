import type { CurrentOfferSnapshot } from '../../domain/types.js';

/** Read-only view of the offers published by the tariff registry. */
export interface OfferSnapshotProvider {
  getCurrentSnapshot(): Promise<CurrentOfferSnapshot | null>;
}
