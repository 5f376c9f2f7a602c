/**
 * Agent backend contracts.
 *
 * The backend is an opaque, stateful conversation capability. One handle
 * represents one ongoing conversation and is not reentrant: the session pool
 * guarantees that at most one caller invokes a given handle at a time.
 */

import type { ContentBlock, MessageParam, StopReason, Usage } from './messages.js';

/**
 * Options used when constructing a new backend handle.
 */
export interface BackendOptions {
  model: string;
  systemPrompt?: string;
  allowedTools?: string[];
  maxTurns?: number;
  /** Extended thinking budget, when the caller asked for it */
  maxThinkingTokens?: number;
}

/**
 * Conversation handed to a backend handle for one turn.
 */
export interface Conversation {
  messages: MessageParam[];
  system?: string;
  model: string;
  maxTokens: number;
  stopSequences?: string[];
  temperature?: number;
  metadata?: Record<string, unknown>;
}

export interface InvokeOptions {
  /** Aborts the in-flight invocation (caller cancellation or per-call timeout) */
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Incremental events produced while a backend handle works on a turn.
 * `result` is the terminal marker.
 */
export type BackendEvent =
  | { type: 'text'; text: string }
  | { type: 'thinking'; thinking: string; signature?: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; toolUseId: string; content: string; isError?: boolean }
  | { type: 'result'; usage?: Partial<Usage>; stopReason?: StopReason };

/**
 * Non-streaming outcome of an invocation.
 */
export interface FinalResult {
  content: ContentBlock[];
  usage: Usage;
  stopReason: StopReason;
}

export type InvokeResult = AsyncIterable<BackendEvent> | Promise<FinalResult>;

export interface BackendHandle {
  /**
   * Run one turn. May fail with BackendUnavailable, BackendTimeout or
   * BackendRejected.
   */
  invoke(conversation: Conversation, options: InvokeOptions): InvokeResult;
  /** Reset conversational memory. Idempotent; failures are surfaced. */
  clear(): Promise<void>;
  /** Release underlying resources. Called exactly once, at eviction. */
  close(): Promise<void>;
}

export interface BackendFactory {
  create(options: BackendOptions): BackendHandle | Promise<BackendHandle>;
}
