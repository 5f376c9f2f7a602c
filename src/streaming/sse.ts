/**
 * Server-Sent Events framing
 *
 * Format:
 *   event: <event>\n
 *   id: <id>\n
 *   retry: <retry>\n
 *   data: <data>\n\n
 */

import type { GatewayError } from '../api/errors.js';
import type { StreamEvent } from '../types/messages.js';

export interface SseChunk {
  event?: string;
  id?: string;
  retry?: number;
  data: string;
}

export function formatSseChunk(chunk: SseChunk): string {
  const parts: string[] = [];

  if (chunk.event) {
    parts.push(`event: ${chunk.event}\n`);
  }

  if (chunk.id) {
    parts.push(`id: ${chunk.id}\n`);
  }

  if (chunk.retry !== undefined) {
    parts.push(`retry: ${chunk.retry}\n`);
  }

  // Data must be present
  parts.push(`data: ${chunk.data}\n\n`);

  return parts.join('');
}

/**
 * Default stream encoder: event name = the event's `type`.
 */
export function encodeSseEvent(event: StreamEvent): string {
  return formatSseChunk({ event: event.type, data: JSON.stringify(event) });
}

/**
 * Error frame for failures after the response headers went out.
 */
export function encodeSseError(error: GatewayError): string {
  return formatSseChunk({ event: 'error', data: JSON.stringify(error.toAnthropicError()) });
}

/**
 * Comment line, used as keepalive.
 */
export function formatSseComment(comment: string): string {
  return `: ${comment}\n\n`;
}
