import type { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Parse a value against a zod schema, raising ConfigError with every
 * issue flattened into the message.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${label}: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
