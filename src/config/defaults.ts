/**
 * Default Configuration Constants
 *
 * Fallbacks used when a component is constructed without configuration.
 * runtime.yaml carries the same values and wins whenever it is loaded.
 */

/**
 * Session Pool Configuration
 */
export const SESSION_POOL = {
  /** Maximum pooled sessions (active + idle) */
  MAX_SESSIONS: 100,

  /** Idle time before a session is eligible for eviction (ms) */
  TTL_MS: 3_600_000, // 1 hour

  /** Reaper interval (ms) */
  CLEANUP_INTERVAL_MS: 60_000, // 1 minute

  /** Longest an acquire waits for a busy session or a free slot (ms) */
  ACQUIRE_TIMEOUT_MS: 30_000, // 30 seconds
} as const;

/**
 * Batch Engine Configuration
 */
export const BATCH = {
  /** Entries executed at once across all jobs */
  CONCURRENCY: 5,

  /** Maximum entries per job */
  MAX_BATCH_SIZE: 100,

  /** How long jobs and their results stay queryable (ms) */
  RETENTION_MS: 29 * 24 * 3_600_000, // 29 days

  /** Retention sweep interval (ms) */
  SWEEP_INTERVAL_MS: 60_000, // 1 minute
} as const;

/**
 * Backend Configuration
 */
export const BACKEND = {
  DEFAULT_MODEL: 'claude-sonnet-4-5-20250514',

  /** Agent turns allowed per invocation */
  MAX_TURNS: 10,

  /** Per-call timeout for a backend invocation (ms) */
  INVOKE_TIMEOUT_MS: 300_000, // 5 minutes
} as const;

/**
 * Streaming Configuration
 */
export const STREAMING = {
  MESSAGE_MODE: 'forward' as const,

  /** Rough characters-per-token ratio used before the backend reports usage */
  CHARS_PER_TOKEN: 4,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING = {
  LEVEL: 'info' as const,
  NAME: 'agent-relay',
} as const;
