/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import type { MessageMode } from '../types/messages.js';
import type { ModelInfo } from '../types/models.js';

/**
 * Validated configuration (matches runtime.yaml structure)
 */
export type Config = Omit<RuntimeConfig, 'environments'>;

export type ConfigEnvironment = 'production' | 'development' | 'test';

/**
 * Environment variables that override single YAML keys.
 */
const ENV_OVERRIDES: ReadonlyArray<{ env: string; path: [string, string]; numeric: boolean }> = [
  { env: 'AGENT_RELAY_MAX_SESSIONS', path: ['session_pool', 'max_sessions'], numeric: true },
  { env: 'AGENT_RELAY_SESSION_TTL_MS', path: ['session_pool', 'ttl_ms'], numeric: true },
  { env: 'AGENT_RELAY_BATCH_CONCURRENCY', path: ['batch', 'concurrency'], numeric: true },
  { env: 'AGENT_RELAY_DEFAULT_MODEL', path: ['backend', 'default_model'], numeric: false },
  { env: 'AGENT_RELAY_MESSAGE_MODE', path: ['streaming', 'message_mode'], numeric: false },
  { env: 'AGENT_RELAY_LOG_LEVEL', path: ['logging', 'level'], numeric: false },
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  // Start from current module directory
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  // Fallback to cwd if package.json not found
  return process.cwd();
}

function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  let output = config;

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.env];
    if (raw === undefined || raw === '') {
      continue;
    }

    const [section, key] = override.path;
    const value = override.numeric ? Number(raw) : raw;
    output = deepMerge(output, { [section]: { [key]: value } });
  }

  return output;
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    })
    .join('\n');
}

/**
 * Load configuration from YAML file
 *
 * The file's `environments.<env>` section is merged over the base, then
 * AGENT_RELAY_* environment variables are applied, then the result is
 * validated.
 */
export function loadConfig(
  configPath?: string,
  environment?: ConfigEnvironment,
  env: NodeJS.ProcessEnv = process.env
): Config {
  // Default config path - use package directory, not user's cwd
  const finalPath = configPath || join(findPackageRoot(), 'config', 'runtime.yaml');

  let merged: Record<string, unknown>;

  try {
    const loaded: unknown = yaml.load(readFileSync(finalPath, 'utf8'));
    if (!isPlainObject(loaded)) {
      throw new Error('top-level value must be a mapping');
    }

    // Determine environment
    const envName = environment || env.NODE_ENV || 'development';
    const { environments, ...base } = loaded;

    merged = base;
    if (isPlainObject(environments)) {
      const envConfig =
        envName === 'production'
          ? environments.production
          : envName === 'test'
          ? environments.test
          : environments.development;

      if (isPlainObject(envConfig)) {
        merged = deepMerge(base, envConfig);
      }
    }
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
        `Please ensure config/runtime.yaml exists in the project root.`
      );
    }
    throw new Error(`Failed to load configuration: ${error}`);
  }

  return validateConfig(applyEnvOverrides(merged, env));
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw new Error(`Configuration validation failed:\n${formatIssues(parseResult.error.issues)}`);
  }

  const data = parseResult.data;
  return {
    session_pool: data.session_pool,
    batch: data.batch,
    backend: data.backend,
    streaming: data.streaming,
    model_aliases: data.model_aliases,
    models: data.models,
    logging: data.logging,
  };
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML session pool config (snake_case) to the pool's options (camelCase)
 */
export function getSessionPoolConfig(config: Config = getConfig()): {
  maxSessions: number;
  ttlMs: number;
  cleanupIntervalMs: number;
  acquireTimeoutMs: number;
} {
  return {
    maxSessions: config.session_pool.max_sessions,
    ttlMs: config.session_pool.ttl_ms,
    cleanupIntervalMs: config.session_pool.cleanup_interval_ms,
    acquireTimeoutMs: config.session_pool.acquire_timeout_ms,
  };
}

/**
 * Convert YAML batch config (snake_case) to the engine's options (camelCase)
 */
export function getBatchEngineConfig(config: Config = getConfig()): {
  concurrency: number;
  maxBatchSize: number;
  retentionMs: number;
  sweepIntervalMs: number;
} {
  return {
    concurrency: config.batch.concurrency,
    maxBatchSize: config.batch.max_batch_size,
    retentionMs: config.batch.retention_ms,
    sweepIntervalMs: config.batch.sweep_interval_ms,
  };
}

/**
 * Convert YAML backend/streaming config (snake_case) to the message service's options
 */
export function getMessageServiceConfig(config: Config = getConfig()): {
  defaultModel: string;
  maxTurns: number;
  invokeTimeoutMs: number;
  systemPrompt?: string;
  allowedTools: string[];
  messageMode: MessageMode;
  modelAliases: Record<string, string>;
  models: ModelInfo[];
} {
  return {
    defaultModel: config.backend.default_model,
    maxTurns: config.backend.max_turns,
    invokeTimeoutMs: config.backend.invoke_timeout_ms,
    systemPrompt: config.backend.system_prompt ?? undefined,
    allowedTools: config.backend.allowed_tools,
    messageMode: config.streaming.message_mode,
    modelAliases: config.model_aliases,
    models: config.models.map((model) => ({
      type: 'model' as const,
      id: model.id,
      display_name: model.display_name,
      created_at: model.created_at,
    })),
  };
}
