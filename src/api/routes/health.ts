import { Router, Request, Response } from 'express';
import { Storage } from '../../storage/types';

export interface HealthInfo {
  whoisHost: string;
  whoisPort: number;
  storageName: string;
}

export function createHealthRoutes(storage: Storage | null, info: HealthInfo): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    let storageStatus: { backend: string; records: number } | null = null;
    if (storage) {
      try {
        storageStatus = { backend: info.storageName || 'memory', records: await storage.size() };
      } catch (err) {
        return res.status(503).json({
          status: 'unhealthy',
          storage: 'unavailable',
          error: String(err),
          timestamp: new Date().toISOString()
        });
      }
    }

    return res.status(200).json({
      status: 'healthy',
      storage: storageStatus ?? 'disabled',
      whois: `${info.whoisHost}:${info.whoisPort}`,
      timestamp: new Date().toISOString()
    });
  });

  // Liveness probe
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  return router;
}
