import type { TariffFragment } from '../../domain/types.js';

/** One slot per user. Saving replaces whatever is pending; clearing an empty slot succeeds. */
export interface PendingUpdateStore {
  save(userId: string, fragment: TariffFragment): Promise<void>;
  load(userId: string): Promise<TariffFragment | null>;
  clear(userId: string): Promise<void>;
}
