import type { TariffProfile } from '../../domain/types.js';

export interface ProfileStore {
  get(userId: string): Promise<TariffProfile | null>;
  list(): Promise<TariffProfile[]>;
  put(profile: TariffProfile): Promise<void>;
}
