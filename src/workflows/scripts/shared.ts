import type { AppConfig } from '../../infrastructure/config.js';
import type { Database } from '../../infrastructure/db/client.js';
import { TelegramChannel } from '../../infrastructure/messaging/telegram.js';
import { createOfferRepository } from '../../services/offers/index.js';
import { createProfileRepository } from '../../services/profile/index.js';
import { createPendingUpdateRepository } from '../../services/pending-update/index.js';
import type { DispatcherDeps } from '../../services/dispatcher/index.js';

export type AppDependencies = DispatcherDeps;

export function createDependencies(config: AppConfig, db: Database): AppDependencies {
  return {
    profiles: createProfileRepository(db),
    offers: createOfferRepository(db),
    pendingUpdates: createPendingUpdateRepository(db),
    channel: new TelegramChannel({
      botToken: config.telegramBotToken,
      timeoutMs: config.telegramTimeoutMs,
    }),
  };
}
