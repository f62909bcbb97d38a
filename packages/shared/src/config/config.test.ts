/**
 * Configuration loading tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, loadConfig, resetConfig, validateConfig } from './index.js';

const MANAGED_VARS = [
  'CACHE_BACKEND',
  'CACHE_CAPACITY',
  'DEPLOY_ON',
  'K8S_AUTO_ROLLBACK',
  'K8S_DRY_RUN',
  'RELEASE_BRANCH',
  'REGISTRY_PASSWORD',
  'RETRY_MAX_ATTEMPTS',
] as const;

describe('config', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of MANAGED_VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    resetConfig();
  });

  it('should apply defaults', () => {
    const config = loadConfig();

    expect(config.cache.backend).toBe('sqlite');
    expect(config.cache.capacity).toBe(1000);
    expect(config.pipeline.releaseBranch).toBe('main');
    expect(config.pipeline.deployOn).toEqual(['push']);
    expect(config.kubernetes.autoRollback).toBe(true);
    expect(config.retry.maxAttempts).toBe(3);
    expect(config.credentials.registryPassword).toBeUndefined();
  });

  it('should coerce values from the environment', () => {
    process.env.CACHE_BACKEND = 'memory';
    process.env.CACHE_CAPACITY = '25';
    process.env.DEPLOY_ON = 'push, pull_request';
    process.env.K8S_AUTO_ROLLBACK = 'false';
    process.env.K8S_DRY_RUN = 'yes';
    process.env.RELEASE_BRANCH = 'release';
    process.env.REGISTRY_PASSWORD = 'test-secret';

    const config = loadConfig();

    expect(config.cache.backend).toBe('memory');
    expect(config.cache.capacity).toBe(25);
    expect(config.pipeline.deployOn).toEqual(['push', 'pull_request']);
    expect(config.kubernetes.autoRollback).toBe(false);
    expect(config.kubernetes.dryRun).toBe(true);
    expect(config.pipeline.releaseBranch).toBe('release');
    expect(config.credentials.registryPassword).toBe('test-secret');
  });

  it('should cache the config until reset', () => {
    process.env.RELEASE_BRANCH = 'trunk';
    const first = getConfig();

    process.env.RELEASE_BRANCH = 'main';
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().pipeline.releaseBranch).toBe('main');
  });

  it('should report invalid values', () => {
    process.env.CACHE_BACKEND = 'redis';
    process.env.DEPLOY_ON = 'push,tag';

    const result = validateConfig();

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors?.some((e) => e.startsWith('cache.backend:'))).toBe(true);
    expect(result.errors?.some((e) => e.startsWith('pipeline.deployOn.1:'))).toBe(true);
  });

  it('should reject a zero retry budget', () => {
    process.env.RETRY_MAX_ATTEMPTS = '0';
    expect(validateConfig().valid).toBe(false);
  });
});
