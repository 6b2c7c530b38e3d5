/**
 * Response helpers for user-service
 */

import { createResponseHelpers } from '@lastcup/platform-core';
import { SERVICE_NAME } from '../../config/logging';

export const { ServiceErrors } = createResponseHelpers(SERVICE_NAME);
