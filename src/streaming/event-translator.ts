/**
 * Backend event translation
 *
 * Turns the backend's incremental events into Anthropic Messages output:
 * either the server-sent event sequence of a streaming response, or a
 * collected MessagesResponse. The message mode is applied here, before
 * anything is forwarded.
 *
 * Output token counts are estimated from text length until the backend
 * reports real usage in its terminal `result` event.
 */

import { randomBytes } from 'node:crypto';
import { STREAMING } from '../config/defaults.js';
import type { BackendEvent, FinalResult } from '../types/backend.js';
import type {
  ContentBlock,
  MessageMode,
  MessagesResponse,
  StopReason,
  StreamEvent,
  ThinkingBlock,
  ToolUseBlock,
  Usage,
} from '../types/messages.js';
import { applyMessageMode, formatToolResultAsXml, formatToolUseAsXml } from './message-mode.js';

export interface TranslationOptions {
  model: string;
  mode: MessageMode;
  messageId?: string;
  /** Input token count reported in message_start and used as fallback usage */
  inputTokens?: number;
}

export function generateMessageId(): string {
  return `msg_${randomBytes(12).toString('hex')}`;
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / STREAMING.CHARS_PER_TOKEN);
}

function thinkingBlock(thinking: string, signature?: string): ThinkingBlock {
  return signature === undefined ? { type: 'thinking', thinking } : { type: 'thinking', thinking, signature };
}

function toUsage(usage: Partial<Usage>): Usage {
  const result: Usage = {
    input_tokens: usage.input_tokens ?? 0,
    output_tokens: usage.output_tokens ?? 0,
  };
  if (usage.cache_creation_input_tokens !== undefined) {
    result.cache_creation_input_tokens = usage.cache_creation_input_tokens;
  }
  if (usage.cache_read_input_tokens !== undefined) {
    result.cache_read_input_tokens = usage.cache_read_input_tokens;
  }
  return result;
}

/**
 * Stateful translator for one streaming response.
 *
 * Content block indices are assigned in emission order. Text is kept in one
 * open block until something else (thinking, a forwarded tool call) has to
 * be emitted.
 */
export class StreamTranslator {
  private readonly options: TranslationOptions;
  private readonly messageId: string;
  private index = 0;
  private textOpen = false;
  private currentText = '';
  private outputChars = 0;
  private reportedOutputTokens?: number;
  private stopReason: StopReason = 'end_turn';

  constructor(options: TranslationOptions) {
    this.options = options;
    this.messageId = options.messageId ?? generateMessageId();
  }

  public get id(): string {
    return this.messageId;
  }

  public start(): StreamEvent[] {
    return [
      {
        type: 'message_start',
        message: {
          id: this.messageId,
          type: 'message',
          role: 'assistant',
          content: [],
          model: this.options.model,
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: this.options.inputTokens ?? 0, output_tokens: 0 },
        },
      },
    ];
  }

  public translate(event: BackendEvent): StreamEvent[] {
    switch (event.type) {
      case 'text':
        return event.text.length > 0 ? this.appendText(event.text) : [];

      case 'thinking': {
        const events = this.closeText();
        events.push({
          type: 'content_block_start',
          index: this.index,
          content_block: thinkingBlock('', event.signature),
        });
        if (event.thinking.length > 0) {
          events.push({
            type: 'content_block_delta',
            index: this.index,
            delta: { type: 'thinking_delta', thinking: event.thinking },
          });
          this.outputChars += event.thinking.length;
        }
        events.push({ type: 'content_block_stop', index: this.index });
        this.index++;
        return events;
      }

      case 'tool_use':
        return this.toolUse({ type: 'tool_use', id: event.id, name: event.name, input: event.input });

      case 'tool_result':
        // Results only surface as text in formatted mode
        if (this.options.mode !== 'formatted') {
          return [];
        }
        return this.appendText(this.separated(formatToolResultAsXml(event.content)));

      case 'result':
        if (event.usage?.output_tokens !== undefined && event.usage.output_tokens > 0) {
          this.reportedOutputTokens = event.usage.output_tokens;
        }
        if (event.stopReason) {
          this.stopReason = event.stopReason;
        }
        return [];
    }
  }

  public finish(): StreamEvent[] {
    const events = this.closeText();
    events.push(
      {
        type: 'message_delta',
        delta: { stop_reason: this.stopReason, stop_sequence: null },
        usage: { output_tokens: this.outputTokens() },
      },
      { type: 'message_stop' }
    );
    return events;
  }

  public outputTokens(): number {
    return this.reportedOutputTokens ?? Math.floor(this.outputChars / STREAMING.CHARS_PER_TOKEN);
  }

  private toolUse(block: ToolUseBlock): StreamEvent[] {
    switch (this.options.mode) {
      case 'ignore':
        return [];
      case 'formatted':
        return this.appendText(this.separated(formatToolUseAsXml(block.name, block.input)));
      case 'forward': {
        const events = this.closeText();
        events.push(
          { type: 'content_block_start', index: this.index, content_block: block },
          { type: 'content_block_stop', index: this.index }
        );
        this.index++;
        return events;
      }
    }
  }

  private separated(text: string): string {
    return this.currentText.length > 0 ? `\n\n${text}` : text;
  }

  private appendText(text: string): StreamEvent[] {
    const events: StreamEvent[] = [];
    if (!this.textOpen) {
      events.push({ type: 'content_block_start', index: this.index, content_block: { type: 'text', text: '' } });
      this.textOpen = true;
    }
    events.push({ type: 'content_block_delta', index: this.index, delta: { type: 'text_delta', text } });
    this.currentText += text;
    this.outputChars += text.length;
    return events;
  }

  private closeText(): StreamEvent[] {
    if (!this.textOpen) {
      return [];
    }
    const events: StreamEvent[] = [{ type: 'content_block_stop', index: this.index }];
    this.index++;
    this.textOpen = false;
    this.currentText = '';
    return events;
  }
}

/**
 * Translate a backend event sequence into a streaming response.
 */
export async function* translateEvents(
  source: AsyncIterable<BackendEvent>,
  options: TranslationOptions
): AsyncGenerator<StreamEvent, void, undefined> {
  const translator = new StreamTranslator(options);
  yield* translator.start();
  for await (const event of source) {
    yield* translator.translate(event);
  }
  yield* translator.finish();
}

function buildResponse(
  options: TranslationOptions,
  content: ContentBlock[],
  usage: Usage,
  stopReason: StopReason
): MessagesResponse {
  return {
    id: options.messageId ?? generateMessageId(),
    type: 'message',
    role: 'assistant',
    content: applyMessageMode(content, options.mode),
    model: options.model,
    stop_reason: stopReason,
    stop_sequence: null,
    usage,
  };
}

/**
 * Drain a backend event sequence into a single response.
 *
 * Thinking blocks come first, then all text as one block, then tool calls.
 * When the backend reports no usage at all, both counts are estimated.
 */
export async function collectResponse(
  source: AsyncIterable<BackendEvent>,
  options: TranslationOptions
): Promise<MessagesResponse> {
  const thinking: ThinkingBlock[] = [];
  const tools: ToolUseBlock[] = [];
  let text = '';
  let usage: Partial<Usage> = {};
  let stopReason: StopReason = 'end_turn';

  for await (const event of source) {
    switch (event.type) {
      case 'text':
        text += event.text;
        break;
      case 'thinking':
        thinking.push(thinkingBlock(event.thinking, event.signature));
        break;
      case 'tool_use':
        tools.push({ type: 'tool_use', id: event.id, name: event.name, input: event.input });
        break;
      case 'tool_result':
        break;
      case 'result':
        if (event.usage) {
          usage = event.usage;
        }
        if (event.stopReason) {
          stopReason = event.stopReason;
        }
        break;
    }
  }

  const content: ContentBlock[] = [...thinking];
  if (text.length > 0) {
    content.push({ type: 'text', text });
  }
  content.push(...tools);

  const resolved = toUsage(usage);
  if (resolved.input_tokens === 0 && resolved.output_tokens === 0) {
    resolved.input_tokens = options.inputTokens ?? 0;
    resolved.output_tokens = estimateTokens(text);
  }

  return buildResponse(options, content, resolved, stopReason);
}

/**
 * Shape a backend's non-streaming result as a response.
 */
export function finalResultToResponse(result: FinalResult, options: TranslationOptions): MessagesResponse {
  return buildResponse(options, result.content, toUsage(result.usage), result.stopReason);
}
