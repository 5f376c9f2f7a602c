import { describe, it, expect } from 'vitest';
import { encodeSseError, encodeSseEvent, formatSseChunk, formatSseComment } from '../../../src/streaming/sse.js';
import { GatewayError } from '../../../src/api/errors.js';

describe('SSE framing', () => {
  it('formats every field in order', () => {
    expect(formatSseChunk({ event: 'ping', id: '7', retry: 1000, data: '{}' })).toBe(
      'event: ping\nid: 7\nretry: 1000\ndata: {}\n\n'
    );
  });

  it('formats a data-only chunk', () => {
    expect(formatSseChunk({ data: 'hello' })).toBe('data: hello\n\n');
  });

  it('names the frame after the event type', () => {
    expect(encodeSseEvent({ type: 'content_block_stop', index: 2 })).toBe(
      'event: content_block_stop\ndata: {"type":"content_block_stop","index":2}\n\n'
    );
  });

  it('encodes errors in the Anthropic envelope', () => {
    const error = new GatewayError('BackendTimeout', 'took too long');

    expect(encodeSseError(error)).toBe(
      'event: error\ndata: {"type":"error","error":{"type":"timeout_error","message":"took too long"}}\n\n'
    );
  });

  it('formats comments', () => {
    expect(formatSseComment('keepalive')).toBe(': keepalive\n\n');
  });
});
