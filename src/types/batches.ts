/**
 * Batch job and entry types.
 */

import type { MessagesResponse } from './messages.js';
import type { MessageParams } from './schemas/messages.js';

/**
 * `ended` and `canceled` are terminal. `canceling` covers the window between
 * a cancel request and the last in-flight entry settling.
 */
export type BatchStatus = 'in_progress' | 'canceling' | 'ended' | 'canceled';

export type BatchErrorType =
  | 'api_error'
  | 'overloaded_error'
  | 'timeout_error'
  | 'invalid_request_error'
  | 'not_found_error';

export type BatchResult =
  | { type: 'pending' }
  | { type: 'succeeded'; message: MessagesResponse }
  | { type: 'errored'; error: { type: BatchErrorType; message: string } }
  | { type: 'canceled' }
  | { type: 'expired' };

export type TerminalBatchResult = Exclude<BatchResult, { type: 'pending' }>;

export type BatchEntryState = 'pending' | 'running' | 'terminal';

export interface BatchEntry {
  customId: string;
  params: MessageParams;
  state: BatchEntryState;
  result: BatchResult;
  startedAt?: number;
  completedAt?: number;
}

export interface RequestCounts {
  processing: number;
  succeeded: number;
  errored: number;
  canceled: number;
  expired: number;
}

/**
 * Read-only snapshot of a job, safe to hand to callers.
 */
export interface BatchJob {
  id: string;
  status: BatchStatus;
  createdAt: number;
  expiresAt: number;
  endedAt?: number;
  cancelInitiatedAt?: number;
  requestCounts: RequestCounts;
  entries: ReadonlyArray<Readonly<BatchEntry>>;
}

/**
 * One line of the JSONL results file.
 */
export interface BatchResultLine {
  custom_id: string;
  result: TerminalBatchResult;
}

/**
 * Anthropic `message_batch` object.
 */
export interface MessageBatch {
  id: string;
  type: 'message_batch';
  processing_status: 'in_progress' | 'canceling' | 'ended';
  request_counts: RequestCounts;
  created_at: string;
  ended_at: string | null;
  expires_at: string;
  archived_at: string | null;
  cancel_initiated_at: string | null;
  results_url: string | null;
}

export interface BatchListOptions {
  limit?: number;
  afterId?: string;
  beforeId?: string;
}

export interface BatchListPage {
  data: BatchJob[];
  hasMore: boolean;
  firstId: string | null;
  lastId: string | null;
}
