/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Temperature parameter (0-1 range, as the Messages API accepts it)
 */
export const ClampedTemperature = z
  .number()
  .min(0, 'Temperature must be at least 0')
  .max(1, 'Temperature cannot exceed 1');

/**
 * Top-p parameter (0-1 range)
 */
export const ClampedTopP = z
  .number()
  .min(0, 'Top-p must be at least 0')
  .max(1, 'Top-p cannot exceed 1');

/**
 * Message mode enum
 */
export const MessageModeSchema = z.enum(['forward', 'formatted', 'ignore']);
