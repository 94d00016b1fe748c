/**
 * @fileoverview Runtime Options Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { RuntimeConfigurationError } from '../../../src/domain/di';
import {
  DEFAULT_CACHE_TTL_MS,
  loadRuntimeOptionsFromEnv,
  parseRuntimeOptions,
} from '../../../src/infrastructure/config';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof RuntimeConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Should have thrown');
}

describe('parseRuntimeOptions', () => {
  it('should fill every default', () => {
    expect(parseRuntimeOptions()).toEqual({
      strictInitialization: true,
      cache: { enabled: true, ttlMs: DEFAULT_CACHE_TTL_MS },
      discovery: { enabled: true },
      logging: { level: 'info', silent: false },
    });
  });

  it('should keep defaults beside partial sections', () => {
    const options = parseRuntimeOptions({ cache: { ttlMs: 60_000 } });

    expect(options.cache).toEqual({ enabled: true, ttlMs: 60_000 });
  });

  it('should reject a non-positive TTL', () => {
    const issues = issuesOf(() => parseRuntimeOptions({ cache: { ttlMs: -5 } }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^cache\.ttlMs: /);
  });

  it('should list every invalid field', () => {
    const issues = issuesOf(() =>
      parseRuntimeOptions({ strictInitialization: 'yes', logging: { level: 'loud' } }),
    );

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^strictInitialization: /);
    expect(issues[1]).toMatch(/^logging\.level: /);
  });

  it('should name the root when the input is not an object', () => {
    expect(issuesOf(() => parseRuntimeOptions(42))).toEqual([
      '(root): Expected object, received number',
    ]);
  });

  it('should put every issue in the error message', () => {
    expect(() => parseRuntimeOptions({ cache: { ttlMs: 0 } })).toThrow(
      /^Invalid runtime options:\n {2}cache\.ttlMs: /,
    );
  });
});

describe('loadRuntimeOptionsFromEnv', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadRuntimeOptionsFromEnv({ PATH: '/usr/bin' })).toEqual(parseRuntimeOptions());
  });

  it('should read every variable', () => {
    const options = loadRuntimeOptionsFromEnv({
      KINDLING_STRICT_INIT: 'false',
      KINDLING_CACHE_ENABLED: ' 0 ',
      KINDLING_CACHE_TTL_MS: '1500',
      KINDLING_DISCOVERY_ENABLED: 'TRUE',
      LOG_LEVEL: 'DEBUG',
    });

    expect(options).toEqual({
      strictInitialization: false,
      cache: { enabled: false, ttlMs: 1500 },
      discovery: { enabled: true },
      logging: { level: 'debug', silent: false },
    });
  });

  it('should let overrides win over the environment', () => {
    const options = loadRuntimeOptionsFromEnv(
      { KINDLING_STRICT_INIT: 'false', KINDLING_CACHE_TTL_MS: '1500' },
      { strictInitialization: true, cache: { ttlMs: 2000 }, logging: { silent: true } },
    );

    expect(options.strictInitialization).toBe(true);
    expect(options.cache.ttlMs).toBe(2000);
    expect(options.logging.silent).toBe(true);
  });

  it('should reject a malformed boolean', () => {
    const issues = issuesOf(() => loadRuntimeOptionsFromEnv({ KINDLING_STRICT_INIT: 'maybe' }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^KINDLING_STRICT_INIT: /);
  });

  it('should reject a non-numeric TTL', () => {
    const issues = issuesOf(() => loadRuntimeOptionsFromEnv({ KINDLING_CACHE_TTL_MS: 'soon' }));

    expect(issues[0]).toMatch(/^KINDLING_CACHE_TTL_MS: /);
  });

  it('should reject an unknown log level', () => {
    const issues = issuesOf(() => loadRuntimeOptionsFromEnv({ LOG_LEVEL: 'loud' }));

    expect(issues[0]).toMatch(/^logging\.level: /);
  });
});
