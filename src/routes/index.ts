import { Router } from 'express';
import { PremiumService } from '../services/premium.service';
import { PremiumController } from '../controllers/premium.controller';
import { createPremiumRoutes } from './premium.routes';

export const createRoutes = (premiumService: PremiumService): Router => {
  const router = Router();

  // API Routes
  router.use('/healths/premiums', createPremiumRoutes(new PremiumController(premiumService)));

  // Health check
  router.get('/health', async (req, res) => {
    const redisUp = await premiumService.isStoreReachable();
    res.status(redisUp ? 200 : 503).json({
      status: redisUp ? 'ok' : 'degraded',
      redis: redisUp ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
