import { Router } from 'express';
import { TemperatureCache } from '../cache/temperatureCache';

export function createHealthRouter(cache: TemperatureCache): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', cachedCities: cache.size });
  });

  return router;
}
