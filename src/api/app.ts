import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createTelegramRouter, type TelegramRouterDeps } from './routes/telegram.js';
import { createRatesRouter } from './routes/rates.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { OfferSnapshotProvider } from '../services/offers/index.js';

export interface AppDeps extends TelegramRouterDeps {
  offers: OfferSnapshotProvider;
  botToken: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createTelegramRouter(deps));
  app.use(createRatesRouter(deps));

  app.use(errorHandler);

  return app;
}
