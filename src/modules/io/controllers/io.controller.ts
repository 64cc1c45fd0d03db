/**
 * Polling Endpoint Controller
 * Adapts Express requests to the transport-neutral dispatcher
 */

import type { Request, RequestHandler } from 'express';
import { ioConfig } from '@/shared/config';
import { generateId, logger } from '@/shared/utils';
import type { IoDispatcher } from '../services';
import type { IoMethod } from '../types';

/**
 * `?test=<anything>` is a deployment health probe, answered without sessions
 */
export function isLivenessProbe(req: Request): boolean {
  const value = req.query[ioConfig.testQueryParam];
  return typeof value === 'string' ? value !== '' : value !== undefined;
}

function toIoMethod(method: string): IoMethod | undefined {
  return method === 'GET' || method === 'POST' ? method : undefined;
}

export function createIoController(dispatcher: IoDispatcher): RequestHandler {
  return async (req, res, next) => {
    const method = toIoMethod(req.method);
    if (!method) {
      methodNotAllowed(req, res, next);
      return;
    }

    if (isLivenessProbe(req)) {
      res.type('text/plain').send(ioConfig.testResponse);
      return;
    }

    const requestId = generateId();

    try {
      const result = await dispatcher.dispatch({
        method,
        sessionId: req.get(ioConfig.sessionHeader),
        body: method === 'POST' ? req.body : undefined,
      });

      logger.debug('Poll handled', {
        requestId,
        method,
        status: result.status,
        messages: result.body.length,
      });

      res.status(result.status).set(result.headers).json(result.body);
    } catch (error) {
      logger.debug('Poll failed', { requestId, method });
      next(error);
    }
  };
}

/**
 * Any verb other than GET and POST
 */
export const methodNotAllowed: RequestHandler = (req, res) => {
  res.status(405).set('Allow', 'GET, POST').end();
};
