import { Router, Request, Response } from 'express';
import { Fetcher } from '../../types/prefixes';
import { logger } from '../../observability/logger';
import { classifyError, getStatusCode } from '../lookup-errors';
import { parseAsList, parseBoolean, toJsonDocument, toPlainText, wantsJson } from '../format';

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

export function createLookupRoutes(fetcher: Fetcher): Router {
  const router = Router();

  router.get('/:asn', async (req: Request, res: Response) => {
    const rawAsn = req.params.asn;
    const parsed = parseAsList(rawAsn);
    if ('invalid' in parsed) {
      return res.status(getStatusCode('routing_error')).type('text/plain').send(`invalid AS number ${parsed.invalid}`);
    }

    const flags: Record<'ipv4' | 'ipv6', boolean> = { ipv4: true, ipv6: true };
    for (const name of ['ipv4', 'ipv6'] as const) {
      const value = parseBoolean(queryString(req, name) ?? 'true');
      if (value === null) {
        return res.status(getStatusCode('routing_error')).type('text/plain').send(`${name} query parameter must be a boolean`);
      }
      flags[name] = value;
    }
    const separator = queryString(req, 'separator') ?? ' ';
    const asList = parsed.asNumbers.join(':');

    try {
      const result = await fetcher.fetch(flags.ipv4, flags.ipv6, parsed.asNumbers);
      // the request timeout may already have answered
      if (res.headersSent) {
        logger.warn('lookup_finished_after_response', { as_numbers: asList });
        return;
      }
      if (wantsJson(req.get('accept'))) {
        return res.status(200).json(toJsonDocument(result));
      }
      return res.status(200).type('text/plain').send(toPlainText(result, separator));
    } catch (err) {
      const errorType = classifyError(err);
      logger.warn('lookup_failed', {
        as_numbers: asList,
        error_type: errorType,
        error: err instanceof Error ? err : String(err)
      });
      if (res.headersSent) {
        return;
      }
      return res
        .status(getStatusCode(errorType))
        .type('text/plain')
        .send(`failed to fetch ip addresses for AS ${asList}`);
    }
  });

  return router;
}
