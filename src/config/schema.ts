import { z } from 'zod';
import type { ConnectionConfig } from './types.js';

const timeoutSchema = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`)
    .optional();

export const connectionConfigSchema = z.object({
  host: z.string({ required_error: 'host is required' }).min(1, 'host is required'),
  port: z
    .number({ invalid_type_error: 'port must be a number' })
    .int('port must be an integer')
    .min(1, 'port must be >= 1')
    .max(65535, 'port must be <= 65535')
    .optional(),
  username: z
    .string({ required_error: 'username is required' })
    .min(1, 'username is required'),
  password: z.string({ required_error: 'password is required' }),
  connectTimeoutMs: timeoutSchema('connectTimeoutMs'),
  shellTimeoutMs: timeoutSchema('shellTimeoutMs'),
});

const canonicalFieldNames = new Map(
  Object.keys(connectionConfigSchema.shape).map((name) => [name.toLowerCase(), name]),
);

/**
 * Renames keys that match a known field ignoring case ("Host", "HOST") to the
 * field's canonical spelling. Unknown keys pass through and are stripped later.
 */
export function normalizeFieldNames(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    normalized[canonicalFieldNames.get(key.toLowerCase()) ?? key] = value;
  }
  return normalized;
}

export function coerceConfig(input: unknown): ConnectionConfig {
  const parseResult = connectionConfigSchema.safeParse(normalizeFieldNames(input));

  if (!parseResult.success) {
    const formatted = parseResult.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid cec-ssh configuration:\n${formatted}`);
  }

  const normalized = parseResult.data;

  return Object.freeze({
    ...normalized,
    port: normalized.port ?? 22,
  } satisfies ConnectionConfig);
}
