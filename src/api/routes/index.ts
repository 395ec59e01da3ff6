import { Router, Request, Response } from 'express';
import { Fetcher } from '../../types/prefixes';
import { Storage } from '../../storage/types';
import { createHealthRoutes, HealthInfo } from './health';
import { createLookupRoutes } from './lookup';

export interface RouteOptions extends HealthInfo {
  baseUrl: string;
}

export function createRoutes(fetcher: Fetcher, storage: Storage | null, options: RouteOptions): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    return res.status(200).json({
      name: 'asn-netblocks',
      description: 'Map AS numbers to the IP networks they announce',
      base_url: options.baseUrl,
      endpoints: buildEndpointList(),
      examples: [
        `${options.baseUrl}/13335`,
        `${options.baseUrl}/13335:15169?ipv6=false&separator=,`
      ]
    });
  });

  // fixed paths first; "/:asn" would swallow them
  router.use('/', createHealthRoutes(storage, options));
  router.use('/', createLookupRoutes(fetcher));

  return router;
}

function buildEndpointList(): Record<string, string> {
  return {
    'GET /:asn': 'Networks for one or more AS numbers separated by ":" (query: ipv4, ipv6, separator; Accept: application/json for JSON)',
    'GET /health': 'Health check',
    'GET /live': 'Liveness probe',
    'GET /metrics': 'Prometheus metrics',
    'GET /metrics/json': 'JSON metrics',
    'GET /': 'API information'
  };
}
