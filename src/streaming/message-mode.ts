/**
 * Message modes
 *
 * Decide how the backend's tool activity reaches API callers:
 * - forward: tool_use blocks pass through unchanged
 * - formatted: tool_use blocks become XML-tagged text merged into the reply
 * - ignore: tool blocks are dropped
 *
 * Thinking blocks are kept in every mode.
 */

import type { ContentBlock, MessageMode, TextBlock, ThinkingBlock } from '../types/messages.js';

const MESSAGE_MODES: ReadonlySet<string> = new Set(['forward', 'formatted', 'ignore']);

export function isMessageMode(value: string): value is MessageMode {
  return MESSAGE_MODES.has(value);
}

/**
 * Resolve a per-request mode override (e.g. a request header), falling back
 * on anything unrecognised.
 */
export function parseMessageMode(value: string | undefined, fallback: MessageMode): MessageMode {
  const normalized = value?.trim().toLowerCase();
  return normalized && isMessageMode(normalized) ? normalized : fallback;
}

export function formatToolUseAsXml(name: string, input: Record<string, unknown>): string {
  return `<tool_use name="${name}">\n${JSON.stringify(input, null, 2)}\n</tool_use>`;
}

export function formatToolResultAsXml(content: string): string {
  return `<tool_result>\n${content}\n</tool_result>`;
}

/**
 * Apply a mode to a collected (non-streaming) response body.
 *
 * In `formatted` mode text and tool blocks collapse into a single text
 * block, parts joined by a blank line.
 */
export function applyMessageMode(blocks: ContentBlock[], mode: MessageMode): ContentBlock[] {
  switch (mode) {
    case 'forward':
      return blocks;

    case 'ignore':
      return blocks.filter((block) => block.type !== 'tool_use');

    case 'formatted': {
      const thinking: ThinkingBlock[] = [];
      const parts: string[] = [];
      for (const block of blocks) {
        if (block.type === 'thinking') {
          thinking.push(block);
        } else if (block.type === 'text') {
          parts.push(block.text);
        } else {
          parts.push(formatToolUseAsXml(block.name, block.input));
        }
      }

      const text = parts.filter((part) => part.length > 0).join('\n\n');
      const merged: TextBlock[] = text.length > 0 ? [{ type: 'text', text }] : [];
      return [...thinking, ...merged];
    }
  }
}
