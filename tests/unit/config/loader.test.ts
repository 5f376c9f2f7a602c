import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getBatchEngineConfig,
  getConfig,
  getMessageServiceConfig,
  getSessionPoolConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';

function baseConfig(): Record<string, Record<string, unknown>> {
  return {
    session_pool: {
      max_sessions: 10,
      ttl_ms: 60_000,
      cleanup_interval_ms: 5_000,
      acquire_timeout_ms: 2_000,
      clear_on_release: true,
    },
    batch: { concurrency: 3, max_batch_size: 50, retention_ms: 86_400_000, sweep_interval_ms: 1_000 },
    backend: {
      default_model: 'test-model',
      max_turns: 4,
      invoke_timeout_ms: 30_000,
      system_prompt: null,
      allowed_tools: ['Read'],
    },
    streaming: { message_mode: 'forward' },
    model_aliases: { sonnet: 'test-model' },
    logging: { level: 'info', name: 'agent-relay-test' },
  };
}

describe('Config Loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'agent-relay-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    resetConfig();
  });

  function writeConfig(config: unknown): string {
    const path = join(dir, 'runtime.yaml');
    writeFileSync(path, yaml.dump(config));
    return path;
  }

  describe('loadConfig', () => {
    it('loads the bundled runtime.yaml with the test overrides', () => {
      const config = loadConfig(undefined, 'test', {});

      expect(config.session_pool).toEqual({
        max_sessions: 4,
        ttl_ms: 60_000,
        cleanup_interval_ms: 1_000,
        acquire_timeout_ms: 1_000,
        clear_on_release: true,
      });
      expect(config.batch.concurrency).toBe(2);
      expect(config.batch.max_batch_size).toBe(100);
      expect(config.logging.level).toBe('silent');
      expect(config.backend.default_model).toBe('claude-sonnet-4-5-20250514');
    });

    it('picks the environment from NODE_ENV when none is given', () => {
      const config = loadConfig(undefined, undefined, { NODE_ENV: 'production' });

      expect(config.logging.level).toBe('warn');
      expect(config.session_pool.max_sessions).toBe(100);
    });

    it('defaults to the development section', () => {
      expect(loadConfig(undefined, undefined, {}).logging.level).toBe('debug');
    });

    it('deep-merges environment sections over the base', () => {
      const path = writeConfig({
        ...baseConfig(),
        environments: { production: { batch: { concurrency: 8 } } },
      });

      const config = loadConfig(path, 'production', {});

      expect(config.batch).toEqual({
        concurrency: 8,
        max_batch_size: 50,
        retention_ms: 86_400_000,
        sweep_interval_ms: 1_000,
      });
    });

    it('applies AGENT_RELAY_* environment overrides last', () => {
      const path = writeConfig(baseConfig());

      const config = loadConfig(path, 'development', {
        AGENT_RELAY_MAX_SESSIONS: '7',
        AGENT_RELAY_MESSAGE_MODE: 'formatted',
        AGENT_RELAY_DEFAULT_MODEL: 'other-model',
        AGENT_RELAY_LOG_LEVEL: '',
      });

      expect(config.session_pool.max_sessions).toBe(7);
      expect(config.streaming.message_mode).toBe('formatted');
      expect(config.backend.default_model).toBe('other-model');
      expect(config.logging.level).toBe('info');
    });

    it('rejects invalid environment overrides', () => {
      const path = writeConfig(baseConfig());

      expect(() => loadConfig(path, 'development', { AGENT_RELAY_MESSAGE_MODE: 'loud' })).toThrow(
        /^Configuration validation failed:\nstreaming\.message_mode /
      );
    });

    it('reports a missing file', () => {
      const path = join(dir, 'missing.yaml');

      expect(() => loadConfig(path, 'test', {})).toThrow(`Configuration file not found: ${path}`);
    });

    it('rejects a file that is not a mapping', () => {
      writeFileSync(join(dir, 'list.yaml'), '- a\n- b\n');

      expect(() => loadConfig(join(dir, 'list.yaml'), 'test', {})).toThrow(
        'Failed to load configuration: Error: top-level value must be a mapping'
      );
    });
  });

  describe('validateConfig', () => {
    it('accepts a complete config and drops the environments section', () => {
      const config = validateConfig({ ...baseConfig(), environments: { test: {} } });

      expect(config).not.toHaveProperty('environments');
      expect(config.model_aliases).toEqual({ sonnet: 'test-model' });
    });

    it('requires sessions to be cleared on release', () => {
      const config = baseConfig();
      config.session_pool = { ...config.session_pool, clear_on_release: false };

      expect(() => validateConfig(config)).toThrow(
        'session_pool.clear_on_release must be true (sessions are always cleared on release)'
      );
    });

    it('requires the reaper to run at least once per ttl', () => {
      const config = baseConfig();
      config.session_pool = { ...config.session_pool, cleanup_interval_ms: 120_000 };

      expect(() => validateConfig(config)).toThrow('session_pool.cleanup_interval_ms must be <= ttl_ms');
    });

    it('requires catalog timestamps in RFC 3339 form', () => {
      const config = {
        ...baseConfig(),
        models: [{ id: 'test-model', display_name: 'Test Model', created_at: 'last week' }],
      };

      expect(() => validateConfig(config)).toThrow(
        'Configuration validation failed:\nmodels.0.created_at must be an RFC 3339 timestamp'
      );
    });

    it('bounds batch concurrency and size', () => {
      const config = baseConfig();
      config.batch = { ...config.batch, concurrency: 0, max_batch_size: 101 };

      expect(() => validateConfig(config)).toThrow(
        'Configuration validation failed:\nbatch.concurrency must be >= 1\nbatch.max_batch_size must be <= 100'
      );
    });
  });

  describe('projections', () => {
    it('maps sections to component options', () => {
      const config = validateConfig(baseConfig());

      expect(getSessionPoolConfig(config)).toEqual({
        maxSessions: 10,
        ttlMs: 60_000,
        cleanupIntervalMs: 5_000,
        acquireTimeoutMs: 2_000,
      });
      expect(getBatchEngineConfig(config)).toEqual({
        concurrency: 3,
        maxBatchSize: 50,
        retentionMs: 86_400_000,
        sweepIntervalMs: 1_000,
      });
      expect(getMessageServiceConfig(config)).toEqual({
        defaultModel: 'test-model',
        maxTurns: 4,
        invokeTimeoutMs: 30_000,
        systemPrompt: undefined,
        allowedTools: ['Read'],
        messageMode: 'forward',
        modelAliases: { sonnet: 'test-model' },
        models: [],
      });
    });

    it('carries the bundled model catalog', () => {
      const models = getMessageServiceConfig(loadConfig(undefined, 'test', {})).models;

      expect(models).toHaveLength(5);
      expect(models[0]).toEqual({
        type: 'model',
        id: 'claude-opus-4-5-20251101',
        display_name: 'Claude Opus 4.5',
        created_at: '2025-11-01T00:00:00Z',
      });
    });

    it('carries the bundled model aliases', () => {
      const aliases = getMessageServiceConfig(loadConfig(undefined, 'test', {})).modelAliases;

      expect(aliases['claude-opus-4-5']).toBe('claude-opus-4-5-20251101');
      expect(aliases['claude-3-5-sonnet-latest']).toBe('claude-sonnet-4-5-20250514');
    });
  });

  describe('global config', () => {
    it('caches until reset', () => {
      const first = getConfig();

      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });
});
