/**
 * Streaming Response Bridge
 *
 * Forwards a live event sequence to a consumer as encoded chunks and emits
 * exactly one `stream_completed` record, however the stream ends:
 *
 * - success: the source drained
 * - error: the source raised; the error is rethrown to the consumer
 * - client_disconnected: the consumer called return() (even before the
 *   first pull) or the bridge's signal aborted as a cancellation
 *
 * A signal that aborts with any other GatewayError reason (a per-call
 * timeout) ends the stream as `error`; the consumer's next pull throws it.
 *
 * After the record is written the `onComplete` hook runs once; the message
 * service uses it to release the leased session. When a pull is still in
 * flight the hook runs after it settles, so the session is never released
 * while the backend is still producing into it. Completion itself does not
 * wait for that pull.
 *
 * @example
 * ```typescript
 * const chunks = bridgeStream(translateEvents(events, options), context, {
 *   sink,
 *   onComplete: () => pool.release(lease),
 * });
 * for await (const chunk of chunks) {
 *   response.write(chunk);
 * }
 * ```
 */

import type { Logger } from 'pino';
import { GatewayError, describeError } from '../api/errors.js';
import { STREAMING } from '../config/defaults.js';
import type { RequestContext } from '../core/request-context.js';
import { recordSafely, type LogSink } from '../telemetry/log-sink.js';
import type { StreamCompletedRecord, StreamCompletionCause } from '../types/log-records.js';
import type { StreamEvent } from '../types/messages.js';
import { abortReason, raceAbort } from '../utils/abort.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { encodeSseEvent } from './sse.js';

export interface StreamBridgeOptions {
  sink: LogSink;
  /** Chunk encoder; SSE framing by default */
  encode?: (event: StreamEvent) => string;
  /** Canceled reason: client disconnect; other reasons: error */
  signal?: AbortSignal;
  onComplete?: (record: StreamCompletedRecord) => void | Promise<void>;
  logger?: Logger;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

class StreamBridge implements AsyncIterableIterator<string> {
  private readonly source: AsyncIterable<StreamEvent>;
  private readonly context: RequestContext;
  private readonly options: StreamBridgeOptions;
  private readonly encode: (event: StreamEvent) => string;
  private readonly startTime = Date.now();

  private iterator?: AsyncIterator<StreamEvent>;
  private pending?: Promise<unknown>;
  private completion?: Promise<void>;
  private sourceClosed = false;
  /** Abort error not yet thrown to the consumer */
  private undelivered?: GatewayError;

  private bytesSent = 0;
  private chunksSent = 0;
  private outputChars = 0;
  private reportedOutputTokens = false;

  constructor(source: AsyncIterable<StreamEvent>, context: RequestContext, options: StreamBridgeOptions) {
    this.source = source;
    this.context = context;
    this.options = options;
    this.encode = options.encode ?? encodeSseEvent;

    const signal = options.signal;
    if (signal?.aborted) {
      this.onAbort();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  public async next(): Promise<IteratorResult<string, undefined>> {
    if (this.completion) {
      await this.completion;
      return this.done();
    }

    this.iterator ??= this.source[Symbol.asyncIterator]();
    const pull = this.iterator.next();
    this.pending = pull;

    let result: IteratorResult<StreamEvent>;
    try {
      result = await raceAbort(pull, this.options.signal, 'stream', this.context.requestId);
    } catch (err) {
      if (this.completion || this.options.signal?.aborted) {
        if (!this.completion) {
          this.onAbort();
        }
        await this.completion;
        return this.done();
      }
      this.pending = undefined;
      this.sourceClosed = true;
      await this.finish('error', err);
      throw err;
    }
    this.pending = undefined;

    if (this.completion) {
      // Settled after the stream already ended
      await this.completion;
      return this.done();
    }

    if (result.done) {
      this.sourceClosed = true;
      await this.finish('success');
      return DONE;
    }

    const chunk = this.encode(result.value);
    this.bytesSent += Buffer.byteLength(chunk, 'utf8');
    this.chunksSent++;
    this.countTokens(result.value);
    return { done: false, value: chunk };
  }

  public async return(): Promise<IteratorResult<string, undefined>> {
    await this.finish('client_disconnected');
    return DONE;
  }

  public async throw(err: unknown): Promise<IteratorResult<string, undefined>> {
    await this.finish('error', err);
    throw err;
  }

  public [Symbol.asyncIterator](): this {
    return this;
  }

  private readonly onAbort = (): void => {
    const reason = abortReason(this.options.signal, 'stream', this.context.requestId);
    // finish() never rejects
    if (reason.code === 'Canceled') {
      void this.finish('client_disconnected');
    } else if (!this.completion) {
      this.undelivered = reason;
      void this.finish('error', reason);
    }
  };

  /**
   * End of iteration; throws an abort error the consumer has not seen yet.
   */
  private done(): IteratorResult<string, undefined> {
    const error = this.undelivered;
    if (error) {
      this.undelivered = undefined;
      throw error;
    }
    return DONE;
  }

  private countTokens(event: StreamEvent): void {
    if (event.type === 'message_start') {
      if (event.message.usage.input_tokens > 0) {
        this.context.tokensIn = event.message.usage.input_tokens;
      }
    } else if (event.type === 'content_block_delta' && !this.reportedOutputTokens) {
      this.outputChars += event.delta.type === 'text_delta' ? event.delta.text.length : event.delta.thinking.length;
      this.context.tokensOut = Math.floor(this.outputChars / STREAMING.CHARS_PER_TOKEN);
    } else if (event.type === 'message_delta') {
      this.reportedOutputTokens = true;
      this.context.tokensOut = event.usage.output_tokens;
    }
  }

  /**
   * Complete the stream once. Later calls share the first completion.
   */
  private finish(cause: StreamCompletionCause, error?: unknown): Promise<void> {
    this.completion ??= this.complete(cause, error);
    return this.completion;
  }

  private async complete(cause: StreamCompletionCause, error?: unknown): Promise<void> {
    this.options.signal?.removeEventListener('abort', this.onAbort);

    const record: StreamCompletedRecord = {
      event: 'stream_completed',
      requestId: this.context.requestId,
      sessionId: this.context.sessionId,
      model: this.context.model,
      cause,
      bytesSent: this.bytesSent,
      chunksSent: this.chunksSent,
      durationMs: Date.now() - this.startTime,
      tokensOut: this.context.tokensOut,
      error: cause === 'error' ? describeError(error) : null,
      errorType: cause === 'error' ? errorType(error) : null,
      timestamp: new Date().toISOString(),
    };

    recordSafely(this.options.sink, record, this.options.logger);

    const logContext = {
      requestId: record.requestId,
      status: cause,
      bytesSent: record.bytesSent,
      chunksSent: record.chunksSent,
      durationMs: record.durationMs,
    };
    if (cause === 'error') {
      this.options.logger?.warn({ ...logContext, error: record.error }, 'Stream failed');
    } else {
      this.options.logger?.info(logContext, 'Stream completed');
    }

    const inFlight = this.pending;
    if (inFlight) {
      // Never rejects
      void this.finishAfter(inFlight, record);
      return;
    }
    await this.closeSource();
    await this.runHook(record);
  }

  private async finishAfter(inFlight: Promise<unknown>, record: StreamCompletedRecord): Promise<void> {
    await inFlight.then(
      () => undefined,
      (err: unknown) => {
        lazyLog(this.options.logger, 'debug', () => ({ error: describeError(err) }), 'In-flight pull failed after completion');
      }
    );
    await this.closeSource();
    await this.runHook(record);
  }

  private async runHook(record: StreamCompletedRecord): Promise<void> {
    if (!this.options.onComplete) {
      return;
    }
    try {
      await this.options.onComplete(record);
    } catch (err) {
      this.options.logger?.error({ err, requestId: record.requestId }, 'Stream completion hook failed');
    }
  }

  private async closeSource(): Promise<void> {
    if (this.sourceClosed || !this.iterator?.return) {
      this.sourceClosed = true;
      return;
    }
    this.sourceClosed = true;
    try {
      await this.iterator.return();
    } catch (err) {
      this.options.logger?.warn({ requestId: this.context.requestId, error: describeError(err) }, 'Closing stream source failed');
    }
  }
}

function errorType(error: unknown): string {
  if (error instanceof GatewayError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}

/**
 * Bridge `source` to a consumer as encoded chunks.
 */
export function bridgeStream(
  source: AsyncIterable<StreamEvent>,
  context: RequestContext,
  options: StreamBridgeOptions
): AsyncIterableIterator<string> {
  return new StreamBridge(source, context, options);
}
