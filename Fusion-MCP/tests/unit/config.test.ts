import { describe, it, expect, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@fusion/shared/Types/errors.js';
import { getConfig, getStrippedEnv, isForbiddenPath, resetConfig } from '../../src/config.js';

const KEYS = ['FUSION_SECURITY_LEVEL', 'FUSION_STRICT_TOOLCHAINS', 'FUSION_DEFAULT_TIMEOUT_MS', 'FUSION_GXX', 'FUSION_SANDBOX_DIR', 'FUSION_TEST_SECRET'];

afterEach(() => {
  for (const key of KEYS) delete process.env[key];
  resetConfig();
});

describe('getConfig', () => {
  it('reads overrides from the environment', () => {
    process.env.FUSION_SECURITY_LEVEL = 'strict';
    process.env.FUSION_STRICT_TOOLCHAINS = '1';
    process.env.FUSION_DEFAULT_TIMEOUT_MS = '1500';
    process.env.FUSION_GXX = 'clang++';
    resetConfig();

    const config = getConfig();
    expect(config.securityLevel).toBe('strict');
    expect(config.strictToolchains).toBe(true);
    expect(config.defaultTimeoutMs).toBe(1500);
    expect(config.toolchains).toMatchObject({ gxx: 'clang++', node: 'node' });
  });

  it('expands ~ in directories', () => {
    process.env.FUSION_SANDBOX_DIR = '~/fusion-box';
    resetConfig();
    expect(getConfig().sandboxDir).toBe(join(homedir(), 'fusion-box'));
  });

  it('caches until reset', () => {
    expect(getConfig()).toBe(getConfig());
  });

  it('rejects an unknown security level', () => {
    process.env.FUSION_SECURITY_LEVEL = 'paranoid';
    resetConfig();
    expect(() => getConfig()).toThrow(ConfigurationError);
  });
});

describe('isForbiddenPath', () => {
  it('matches forbidden prefixes on path boundaries', () => {
    expect(isForbiddenPath('/etc/hosts')).toBe(true);
    expect(isForbiddenPath(join(homedir(), '.ssh', 'id_test'))).toBe(true);
    expect(isForbiddenPath('/etcetera/file')).toBe(false);
  });
});

describe('getStrippedEnv', () => {
  it('passes only allowlisted variables', () => {
    process.env.FUSION_TEST_SECRET = 'test-secret';
    const env = getStrippedEnv();
    expect(env.FUSION_TEST_SECRET).toBeUndefined();
    expect(env.PATH).toBe(process.env.PATH);
  });
});
