/**
 * Structured records handed to a LogSink.
 */

export type RequestOutcome = 'success' | 'error' | 'canceled' | 'client_disconnected';

export type StreamCompletionCause = 'success' | 'error' | 'client_disconnected';

export interface RequestCompletedRecord {
  event: 'request_completed';
  requestId: string;
  sessionId: string | null;
  path: string;
  method: string;
  model: string | null;
  stream: boolean;
  outcome: RequestOutcome;
  durationMs: number;
  tokensIn: number;
  tokensOut: number;
  error: string | null;
  timestamp: string;
}

export interface StreamCompletedRecord {
  event: 'stream_completed';
  requestId: string;
  sessionId: string | null;
  model: string | null;
  cause: StreamCompletionCause;
  bytesSent: number;
  chunksSent: number;
  durationMs: number;
  tokensOut: number;
  error: string | null;
  errorType: string | null;
  timestamp: string;
}

export interface BatchEntryCompletedRecord {
  event: 'batch_entry_completed';
  batchId: string;
  customId: string;
  requestId: string;
  result: 'succeeded' | 'errored' | 'canceled' | 'expired';
  durationMs: number;
  error: string | null;
  timestamp: string;
}

export interface BatchCompletedRecord {
  event: 'batch_completed';
  batchId: string;
  status: 'ended' | 'canceled';
  succeeded: number;
  errored: number;
  canceled: number;
  expired: number;
  durationMs: number;
  timestamp: string;
}

export type LogRecord =
  | RequestCompletedRecord
  | StreamCompletedRecord
  | BatchEntryCompletedRecord
  | BatchCompletedRecord;
