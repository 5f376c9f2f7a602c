/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, including
 * cross-field checks between related timers.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { MessageModeSchema } from './common.js';
import { MAX_BATCH_ENTRIES } from './batches.js';

/**
 * Session Pool Configuration
 */
export const SessionPoolConfigSchema = z
  .object({
    max_sessions: z.number().int().positive('Max sessions must be positive'),
    ttl_ms: z.number().int().min(1000, 'must be >= 1000ms'),
    cleanup_interval_ms: z.number().int().min(100, 'must be >= 100ms'),
    acquire_timeout_ms: z.number().int().positive('must be positive'),
    // Context is always cleared between leases; the key only documents that.
    clear_on_release: z.literal(true, {
      errorMap: () => ({ message: 'must be true (sessions are always cleared on release)' }),
    }),
  })
  .refine((data) => data.cleanup_interval_ms <= data.ttl_ms, {
    message: 'must be <= ttl_ms',
    path: ['cleanup_interval_ms'],
  });

/**
 * Batch Engine Configuration
 */
export const BatchConfigSchema = z.object({
  concurrency: z.number().int().min(1, 'must be >= 1').max(64, 'must be <= 64'),
  max_batch_size: z
    .number()
    .int()
    .min(1, 'must be >= 1')
    .max(MAX_BATCH_ENTRIES, `must be <= ${MAX_BATCH_ENTRIES}`),
  retention_ms: z.number().int().positive('must be positive'),
  sweep_interval_ms: z.number().int().min(100, 'must be >= 100ms'),
});

/**
 * Backend Configuration
 */
export const BackendConfigSchema = z.object({
  default_model: z.string().min(1, 'Default model cannot be empty'),
  max_turns: z.number().int().positive('must be positive'),
  invoke_timeout_ms: z.number().int().positive('must be positive'),
  system_prompt: z.string().nullable(),
  allowed_tools: z.array(z.string()),
});

/**
 * Streaming Configuration
 */
export const StreamingConfigSchema = z.object({
  message_mode: MessageModeSchema,
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  name: z.string().min(1, 'Logger name cannot be empty'),
});

/**
 * Model catalog entry
 */
export const ModelConfigSchema = z.object({
  id: z.string().min(1, 'Model id cannot be empty'),
  display_name: z.string().min(1, 'Display name cannot be empty'),
  created_at: z.string().datetime({ message: 'must be an RFC 3339 timestamp' }),
});

const RuntimeConfigSchemaBase = z.object({
  session_pool: SessionPoolConfigSchema,
  batch: BatchConfigSchema,
  backend: BackendConfigSchema,
  streaming: StreamingConfigSchema,
  model_aliases: z.record(z.string().min(1)),
  models: z.array(ModelConfigSchema).default([]),
  logging: LoggingConfigSchema,
});

/**
 * Complete Runtime Configuration Schema
 */
export const RuntimeConfigSchema = RuntimeConfigSchemaBase.extend({
  environments: z
    .object({
      production: z.record(z.unknown()).optional(),
      development: z.record(z.unknown()).optional(),
      test: z.record(z.unknown()).optional(),
    })
    .optional(),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
