/**
 * Messages API request schemas
 *
 * Inbound requests are validated here before any session is leased, so a
 * malformed request never touches the backend.
 */

import { z } from 'zod';
import {
  ClampedTemperature,
  ClampedTopP,
  NonEmptyString,
  NonNegativeInteger,
  PositiveInteger,
} from './common.js';

export const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: NonEmptyString,
  name: NonEmptyString,
  input: z.record(z.unknown()),
});

export const ToolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  tool_use_id: NonEmptyString,
  content: z
    .union([z.string(), z.array(TextBlockSchema)])
    .default('')
    .transform((content) =>
      typeof content === 'string' ? content : content.map((block) => block.text).join('')
    ),
  is_error: z.boolean().optional(),
});

export const MessageParamSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.union([
    z.string(),
    z.array(z.discriminatedUnion('type', [TextBlockSchema, ToolUseBlockSchema, ToolResultBlockSchema])),
  ]),
});

/**
 * System prompt: plain string or a list of text blocks (joined with a space).
 */
export const SystemPromptSchema = z
  .union([z.string(), z.array(TextBlockSchema)])
  .transform((system) =>
    typeof system === 'string' ? system : system.map((block) => block.text).join(' ')
  );

export const ThinkingConfigSchema = z.object({
  type: z.literal('enabled'),
  budget_tokens: z.number().int().min(1024, 'Thinking budget must be at least 1024 tokens'),
});

export const MessageParamsSchema = z.object({
  model: NonEmptyString,
  messages: z.array(MessageParamSchema).min(1, 'At least one message is required'),
  max_tokens: PositiveInteger.default(4096),
  system: SystemPromptSchema.optional(),
  stop_sequences: z.array(z.string()).optional(),
  temperature: ClampedTemperature.optional(),
  top_p: ClampedTopP.optional(),
  top_k: NonNegativeInteger.optional(),
  metadata: z.record(z.unknown()).optional(),
  thinking: ThinkingConfigSchema.optional(),
});

export const MessagesRequestSchema = MessageParamsSchema.extend({
  stream: z.boolean().optional(),
});

/**
 * Token counting takes the prompt-bearing fields only.
 */
export const CountTokensRequestSchema = MessageParamsSchema.pick({
  model: true,
  messages: true,
  system: true,
  thinking: true,
});

export type MessageParams = z.infer<typeof MessageParamsSchema>;
export type MessagesRequest = z.infer<typeof MessagesRequestSchema>;
export type MessagesRequestInput = z.input<typeof MessagesRequestSchema>;
export type CountTokensRequest = z.infer<typeof CountTokensRequestSchema>;
