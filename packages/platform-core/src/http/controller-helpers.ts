/**
 * Controller Helpers - Reduce boilerplate in Express controllers
 *
 * ```typescript
 * const { handleRequest } = createControllerHelpers(ServiceErrors);
 *
 * async getSetting(req: Request, res: Response) {
 *   await handleRequest({
 *     req, res,
 *     errorMessage: 'Failed to get setting',
 *     handler: async () => this.settingService.findOrCreate(userId),
 *   });
 * }
 * ```
 */

import type { Request, Response } from 'express';
import type { ServiceErrorHelpers } from './response-helpers';

interface HandleRequestOptions {
  req: Request;
  res: Response;
  errorMessage: string;
  handler: () => Promise<unknown>;
  successStatus?: number;
}

export function createControllerHelpers(serviceErrors: ServiceErrorHelpers) {
  async function handleRequest({ req, res, errorMessage, handler, successStatus = 200 }: HandleRequestOptions) {
    try {
      const data = await handler();
      res.status(successStatus).json({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      serviceErrors.fromException(res, error, errorMessage, req);
    }
  }

  return { handleRequest };
}

/**
 * User id forwarded by the gateway after token verification
 */
export function extractUserId(req: Request): string | undefined {
  const header = req.headers['x-user-id'];
  return typeof header === 'string' && header.trim().length > 0 ? header.trim() : undefined;
}
