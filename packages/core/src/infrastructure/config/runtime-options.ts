/**
 * @fileoverview Runtime Options - Validated bootstrap configuration
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Options are validated with zod and every field has a default, so
 * `parseRuntimeOptions({})` yields a complete configuration.
 *
 * | Environment variable         | Option                   |
 * |------------------------------|--------------------------|
 * | `KINDLING_STRICT_INIT`       | `strictInitialization`   |
 * | `KINDLING_CACHE_ENABLED`     | `cache.enabled`          |
 * | `KINDLING_CACHE_TTL_MS`      | `cache.ttlMs`            |
 * | `KINDLING_DISCOVERY_ENABLED` | `discovery.enabled`      |
 * | `LOG_LEVEL`                  | `logging.level`          |
 *
 * @version 1.0.0
 */

import { z } from 'zod';

import { RuntimeConfigurationError } from '../../domain/di';
import { LOG_LEVELS } from '../logging';

export const DEFAULT_CACHE_TTL_MS = 300_000;

// ============================================================================
// Schemas
// ============================================================================

export const RuntimeOptionsSchema = z.object({
  /**
   * Abort bulk initialization on the first construction failure.
   */
  strictInitialization: z.boolean().default(true),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlMs: z.number().int().positive().default(DEFAULT_CACHE_TTL_MS),
    })
    .default({}),
  discovery: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      silent: z.boolean().default(false),
    })
    .default({}),
});

export type RuntimeOptions = z.infer<typeof RuntimeOptionsSchema>;
export type RuntimeOptionsInput = z.input<typeof RuntimeOptionsSchema>;

const EnvBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const RuntimeEnvSchema = z.object({
  KINDLING_STRICT_INIT: EnvBoolean.optional(),
  KINDLING_CACHE_ENABLED: EnvBoolean.optional(),
  KINDLING_CACHE_TTL_MS: z.coerce.number().int().positive().optional(),
  KINDLING_DISCOVERY_ENABLED: EnvBoolean.optional(),
  LOG_LEVEL: z.string().trim().toLowerCase().optional(),
});

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate options and fill in defaults.
 *
 * @throws RuntimeConfigurationError listing every invalid field
 *
 * @example
 * ```typescript
 * const options = parseRuntimeOptions({ cache: { ttlMs: 60_000 } });
 * options.cache.enabled; // true
 * ```
 */
export function parseRuntimeOptions(input: unknown = {}): RuntimeOptions {
  const result = RuntimeOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new RuntimeConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read options from environment variables; unset variables keep their
 * defaults. `overrides` win over the environment section by section.
 */
export function loadRuntimeOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: RuntimeOptionsInput = {},
): RuntimeOptions {
  const parsedEnv = RuntimeEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new RuntimeConfigurationError(formatIssues(parsedEnv.error));
  }
  const vars = parsedEnv.data;

  return parseRuntimeOptions({
    strictInitialization: overrides.strictInitialization ?? vars.KINDLING_STRICT_INIT,
    cache: {
      enabled: vars.KINDLING_CACHE_ENABLED,
      ttlMs: vars.KINDLING_CACHE_TTL_MS,
      ...overrides.cache,
    },
    discovery: {
      enabled: vars.KINDLING_DISCOVERY_ENABLED,
      ...overrides.discovery,
    },
    logging: {
      level: vars.LOG_LEVEL,
      ...overrides.logging,
    },
  });
}
