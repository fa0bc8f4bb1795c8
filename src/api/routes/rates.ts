import { Router, type Request, type Response } from 'express';
import { successResponse, sendAppError } from '../middleware/error-handler.js';
import { authenticateRequest } from '../auth/telegram-init-data.js';
import { loadCurrentOffers, type OfferSnapshotProvider } from '../../services/offers/index.js';
import { getProfile, type ProfileStore } from '../../services/profile/index.js';

export interface RatesRouterDeps {
  profiles: ProfileStore;
  offers: OfferSnapshotProvider;
  botToken: string;
}

export function createRatesRouter(deps: RatesRouterDeps): Router {
  const router = Router();

  router.get('/api/rates/current', async (req: Request, res: Response) => {
    const auth = authenticateRequest(req, deps.botToken);
    if (!auth.ok) return sendAppError(res, auth.error);

    const snapshot = await loadCurrentOffers(deps.offers);
    if (!snapshot.ok) return sendAppError(res, snapshot.error);

    res.json(successResponse(snapshot.value));
  });

  router.get('/api/user/rates', async (req: Request, res: Response) => {
    const auth = authenticateRequest(req, deps.botToken);
    if (!auth.ok) return sendAppError(res, auth.error);

    const profile = await getProfile(deps.profiles, String(auth.value.id));
    if (!profile.ok) return sendAppError(res, profile.error);

    res.json(successResponse({
      userId: profile.value.userId,
      electricity: profile.value.electricity,
      gas: profile.value.gas ?? null,
    }));
  });

  return router;
}
