import type { z } from 'zod';
import { ValidationError } from '../error-handling/errors';

export function parsePositiveInt(envVar: string, defaultValue: number, minValue = 1): number {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < minValue) {
    throw new Error(
      `Invalid ${envVar}: "${value}". Must be a positive integer >= ${minValue}. ` + `Default is ${defaultValue}.`
    );
  }
  return parsed;
}

/**
 * Validate an environment map against a zod schema, failing fast with every
 * offending variable listed in one message.
 */
export function parseEnvironment<S extends z.ZodTypeAny>(
  schema: S,
  env: NodeJS.ProcessEnv,
  serviceName: string
): z.infer<S> {
  const result = schema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const problems = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  throw new ValidationError(`Invalid environment configuration for ${serviceName}: ${problems.join('; ')}`, {
    serviceName,
    problems,
  });
}
