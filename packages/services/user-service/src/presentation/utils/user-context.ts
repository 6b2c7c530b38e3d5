import type { Request, Response } from 'express';
import { z } from 'zod';
import { extractUserId } from '@lastcup/platform-core';
import { ServiceErrors } from './response-helpers';

const userIdSchema = z.string().uuid();

/**
 * Reads the gateway-set `x-user-id` header. Sends 401 when it is missing and
 * 400 when it is not a UUID, returning undefined in both cases.
 */
export function requireUserId(req: Request, res: Response): string | undefined {
  const userId = extractUserId(req);
  if (!userId) {
    ServiceErrors.unauthorized(res, 'User ID required', req);
    return undefined;
  }
  if (!userIdSchema.safeParse(userId).success) {
    ServiceErrors.badRequest(res, 'User ID must be a UUID', req);
    return undefined;
  }
  return userId;
}
