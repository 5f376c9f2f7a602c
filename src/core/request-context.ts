/**
 * Request Context
 *
 * Per-request metadata carried through one Messages call or one batch
 * entry. It travels explicitly as a parameter and implicitly through
 * AsyncLocalStorage, so code deep in a call chain can find the current
 * request id without threading it everywhere.
 *
 * A context completes exactly once; completion hands a single
 * `request_completed` record to the LogSink.
 *
 * @example
 * ```typescript
 * const context = createRequestContext({ path: '/v1/messages', method: 'POST' });
 * await runWithContext(context, async () => {
 *   getContext()?.requestId; // same context
 * });
 * context.complete(sink);
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';
import { GatewayError, describeError } from '../api/errors.js';
import type { RequestCompletedRecord, RequestOutcome } from '../types/log-records.js';
import { recordSafely, type LogSink } from '../telemetry/log-sink.js';

export interface RequestContextInit {
  requestId?: string;
  sessionId?: string | null;
  path?: string;
  method?: string;
  model?: string | null;
  stream?: boolean;
}

export function generateRequestId(): string {
  return `req_${randomBytes(6).toString('hex')}`;
}

export class RequestContext {
  public readonly requestId: string;
  public readonly path: string;
  public readonly method: string;
  public readonly startTime: number;
  public sessionId: string | null;
  public model: string | null;
  public stream: boolean;
  public tokensIn = 0;
  public tokensOut = 0;
  public error: string | null = null;
  public outcome: RequestOutcome = 'success';

  private completed = false;

  constructor(init: RequestContextInit = {}) {
    this.requestId = init.requestId ?? generateRequestId();
    this.sessionId = init.sessionId ?? null;
    this.path = init.path ?? '/v1/messages';
    this.method = init.method ?? 'POST';
    this.model = init.model ?? null;
    this.stream = init.stream ?? false;
    this.startTime = Date.now();
  }

  public get durationMs(): number {
    return Date.now() - this.startTime;
  }

  public isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Record a failure. Cancellation is recorded as `canceled`, anything else
   * as `error`.
   */
  public fail(error: unknown): void {
    this.error = describeError(error);
    this.outcome = error instanceof GatewayError && error.code === 'Canceled' ? 'canceled' : 'error';
  }

  /**
   * Finish the request and emit its record.
   *
   * @returns false when the context had already completed
   */
  public complete(sink: LogSink, outcome?: RequestOutcome, logger?: Logger): boolean {
    if (this.completed) {
      return false;
    }
    this.completed = true;
    if (outcome) {
      this.outcome = outcome;
    }
    recordSafely(sink, this.toRecord(), logger);
    return true;
  }

  public toRecord(): RequestCompletedRecord {
    return {
      event: 'request_completed',
      requestId: this.requestId,
      sessionId: this.sessionId,
      path: this.path,
      method: this.method,
      model: this.model,
      stream: this.stream,
      outcome: this.outcome,
      durationMs: this.durationMs,
      tokensIn: this.tokensIn,
      tokensOut: this.tokensOut,
      error: this.error,
      timestamp: new Date().toISOString(),
    };
  }
}

export function createRequestContext(init: RequestContextInit = {}): RequestContext {
  return new RequestContext(init);
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` with `context` as the ambient request context.
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}
