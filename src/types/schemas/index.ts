/**
 * Zod schema exports
 *
 * These schemas provide runtime validation for all API boundaries,
 * ensuring type safety and clear error messages for invalid inputs.
 *
 * @example
 * ```typescript
 * import { MessagesRequestSchema } from 'agent-relay';
 *
 * const result = MessagesRequestSchema.safeParse({ model: 'claude-sonnet-4-5', messages: [] });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Messages API schemas
export * from './messages.js';

// Batch schemas
export * from './batches.js';

// Config schemas
export * from './config.js';
