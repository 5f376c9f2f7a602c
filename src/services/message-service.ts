/**
 * Message Service
 *
 * One Messages call end to end: validate the request, lease a session,
 * invoke the backend, then either collect a MessagesResponse or hand back a
 * bridged SSE stream, and finally release the session and complete the
 * request context.
 *
 * A per-call timeout and the caller's AbortSignal travel on one linked
 * signal: a timeout fails the call with BackendTimeout, an abort with
 * Canceled. Both reach the caller at once, even when the backend ignores the
 * signal; the session is released only after the abandoned backend work
 * settles. Backend failures are never retried.
 *
 * Token counting and the model catalog need no session.
 */

import type { Logger } from 'pino';
import { BACKEND, STREAMING } from '../config/defaults.js';
import { GatewayError, describeError, toGatewayError, zodErrorToGatewayError } from '../api/errors.js';
import type { SessionLease } from '../core/pooled-session.js';
import type { SessionPool } from '../core/session-pool.js';
import { createRequestContext, runWithContext, type RequestContext } from '../core/request-context.js';
import { bridgeStream } from '../streaming/stream-bridge.js';
import {
  collectResponse,
  estimateTokens,
  finalResultToResponse,
  translateEvents,
  type TranslationOptions,
} from '../streaming/event-translator.js';
import { NoopLogSink, type LogSink } from '../telemetry/log-sink.js';
import type { BackendEvent, BackendOptions, Conversation, FinalResult, InvokeResult } from '../types/backend.js';
import type { MessageMode, MessagesResponse } from '../types/messages.js';
import type { ModelInfo, ModelListOptions, ModelListPage, TokenCount } from '../types/models.js';
import type { RequestOutcome } from '../types/log-records.js';
import {
  CountTokensRequestSchema,
  MessagesRequestSchema,
  type MessageParams,
  type MessagesRequest,
} from '../types/schemas/messages.js';
import { linkSignal, raceAbort, type CallSignal } from '../utils/abort.js';
import { lazyLog } from '../utils/logger-helpers.js';

export interface MessageServiceConfig {
  defaultModel: string;
  maxTurns: number;
  invokeTimeoutMs: number;
  systemPrompt?: string;
  allowedTools: string[];
  messageMode: MessageMode;
  modelAliases: Record<string, string>;
  /** Catalog answered by listModels/getModel */
  models: ModelInfo[];
}

export interface MessageServiceOptions extends Partial<MessageServiceConfig> {
  pool: SessionPool;
  sink?: LogSink;
  logger?: Logger;
}

export interface MessageCallOptions {
  /** Named conversation; omitted means an ephemeral session */
  sessionId?: string;
  signal?: AbortSignal;
  /** Overrides the configured invoke timeout */
  timeoutMs?: number;
  messageMode?: MessageMode;
  /** Caller-owned context; created when absent */
  context?: RequestContext;
}

const DEFAULT_MODEL_LIMIT = 20;
const MAX_MODEL_LIMIT = 1000;

function isEventStream(result: InvokeResult): result is AsyncIterable<BackendEvent> {
  return Symbol.asyncIterator in result;
}

/**
 * Replay a non-streaming backend result as an event sequence.
 */
async function* finalResultEvents(result: Promise<FinalResult>): AsyncGenerator<BackendEvent, void, undefined> {
  const final = await result;
  for (const block of final.content) {
    switch (block.type) {
      case 'text':
        yield { type: 'text', text: block.text };
        break;
      case 'thinking':
        yield { type: 'thinking', thinking: block.thinking, signature: block.signature };
        break;
      case 'tool_use':
        yield { type: 'tool_use', id: block.id, name: block.name, input: block.input };
        break;
    }
  }
  yield { type: 'result', usage: final.usage, stopReason: final.stopReason };
}

function outcomeOf(cause: 'success' | 'error' | 'client_disconnected', errorType: string | null): RequestOutcome {
  if (cause === 'error') {
    return errorType === 'Canceled' ? 'canceled' : 'error';
  }
  return cause;
}

export class MessageService {
  private readonly config: MessageServiceConfig;
  private readonly pool: SessionPool;
  private readonly sink: LogSink;
  private readonly logger?: Logger;

  constructor(options: MessageServiceOptions) {
    this.pool = options.pool;
    this.sink = options.sink ?? new NoopLogSink();
    this.logger = options.logger;
    this.config = {
      defaultModel: options.defaultModel ?? BACKEND.DEFAULT_MODEL,
      maxTurns: options.maxTurns ?? BACKEND.MAX_TURNS,
      invokeTimeoutMs: options.invokeTimeoutMs ?? BACKEND.INVOKE_TIMEOUT_MS,
      systemPrompt: options.systemPrompt,
      allowedTools: options.allowedTools ?? [],
      messageMode: options.messageMode ?? STREAMING.MESSAGE_MODE,
      modelAliases: options.modelAliases ?? {},
      models: options.models ?? [],
    };
  }

  /**
   * Map a public model alias to the backend model id.
   */
  public resolveModel(model: string | undefined): string {
    if (!model) {
      return this.config.defaultModel;
    }
    return this.config.modelAliases[model] ?? model;
  }

  /**
   * @throws GatewayError InvalidParams
   */
  public parseRequest(input: unknown): MessagesRequest {
    const parsed = MessagesRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }
    return parsed.data;
  }

  /**
   * Estimated input tokens of a request, without invoking the backend.
   *
   * @throws GatewayError InvalidParams
   */
  public countTokens(input: unknown): TokenCount {
    const parsed = CountTokensRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }
    return { input_tokens: this.estimateInputTokens(parsed.data) };
  }

  /**
   * Catalog models in configured order, cursor-paginated by id.
   */
  public listModels(options: ModelListOptions = {}): ModelListPage {
    const limit = options.limit ?? DEFAULT_MODEL_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_MODEL_LIMIT) {
      throw new GatewayError('InvalidParams', `limit must be an integer between 1 and ${MAX_MODEL_LIMIT}`, {
        limit,
      });
    }

    let models = this.config.models;
    if (options.afterId) {
      const index = models.findIndex((model) => model.id === options.afterId);
      if (index !== -1) {
        models = models.slice(index + 1);
      }
    }
    if (options.beforeId) {
      const index = models.findIndex((model) => model.id === options.beforeId);
      if (index !== -1) {
        models = models.slice(0, index);
      }
    }

    const data = models.slice(0, limit).map((model) => ({ ...model }));
    return {
      data,
      hasMore: models.length > limit,
      firstId: data[0]?.id ?? null,
      lastId: data[data.length - 1]?.id ?? null,
    };
  }

  /**
   * Look up a catalog model; aliases resolve first.
   *
   * @throws GatewayError ModelNotFound
   */
  public getModel(modelId: string): ModelInfo {
    const resolved = this.config.modelAliases[modelId] ?? modelId;
    const model = this.config.models.find((entry) => entry.id === resolved);
    if (!model) {
      throw new GatewayError('ModelNotFound', `Model not found: ${modelId}`, { model: modelId });
    }
    return { ...model };
  }

  /**
   * Non-streaming call.
   */
  public async createMessage(input: unknown, options: MessageCallOptions = {}): Promise<MessagesResponse> {
    const context =
      options.context ?? createRequestContext({ sessionId: options.sessionId ?? null, stream: false });

    try {
      const request = this.parseRequest(input);
      if (request.stream) {
        throw new GatewayError('InvalidParams', 'stream: true requests must use streamMessage');
      }
      return await runWithContext(context, () => this.collect(request, options, context));
    } catch (err) {
      const error = toGatewayError(err);
      context.fail(error);
      throw error;
    } finally {
      context.complete(this.sink, undefined, this.logger);
    }
  }

  /**
   * Streaming call. Resolves once a session is leased and the backend
   * accepted the turn; the returned iterator yields SSE frames. The session
   * is released when the stream completes, whichever way it ends.
   */
  public async streamMessage(input: unknown, options: MessageCallOptions = {}): Promise<AsyncIterableIterator<string>> {
    const context =
      options.context ?? createRequestContext({ sessionId: options.sessionId ?? null, stream: true });
    context.stream = true;

    let call: CallSignal | undefined;
    let lease: SessionLease | undefined;
    try {
      const request = this.parseRequest(input);
      const params = this.prepare(request, context);
      call = linkSignal(
        options.signal,
        options.timeoutMs ?? this.config.invokeTimeoutMs,
        'messages.stream',
        context.requestId
      );

      const acquired = await this.pool.acquire(options.sessionId, {
        backendOptions: this.backendOptions(params),
        signal: call.signal,
        requestId: context.requestId,
      });
      lease = acquired;
      context.sessionId = acquired.sessionId;

      const invoked = runWithContext(context, () =>
        acquired.handle.invoke(this.conversation(params), {
          signal: call?.signal,
          requestId: context.requestId,
        })
      );
      if (!isEventStream(invoked)) {
        // Surfaced by the first pull, which may never come
        void invoked.catch((err: unknown) => {
          lazyLog(this.logger, 'debug', () => ({ requestId: context.requestId, error: describeError(err) }), 'Backend result rejected');
        });
      }
      const events = isEventStream(invoked) ? invoked : finalResultEvents(invoked);
      const callSignal = call;

      return bridgeStream(translateEvents(events, this.translation(params, options)), context, {
        sink: this.sink,
        signal: callSignal.signal,
        logger: this.logger,
        onComplete: async (record) => {
          callSignal.dispose();
          await this.pool.release(acquired);
          context.error = record.error;
          context.complete(this.sink, outcomeOf(record.cause, record.errorType), this.logger);
        },
      });
    } catch (err) {
      call?.dispose();
      if (lease) {
        await this.pool.release(lease);
      }
      const error = toGatewayError(err);
      context.fail(error);
      context.complete(this.sink, undefined, this.logger);
      throw error;
    }
  }

  public getConfig(): Readonly<MessageServiceConfig> {
    return this.config;
  }

  private async collect(
    request: MessagesRequest,
    options: MessageCallOptions,
    context: RequestContext
  ): Promise<MessagesResponse> {
    const params = this.prepare(request, context);
    const call = linkSignal(
      options.signal,
      options.timeoutMs ?? this.config.invokeTimeoutMs,
      'messages.create',
      context.requestId
    );

    let lease: SessionLease | undefined;
    let work: Promise<MessagesResponse> | undefined;
    let workSettled = false;
    try {
      lease = await this.pool.acquire(options.sessionId, {
        backendOptions: this.backendOptions(params),
        signal: call.signal,
        requestId: context.requestId,
      });
      context.sessionId = lease.sessionId;

      const invoked = lease.handle.invoke(this.conversation(params), {
        signal: call.signal,
        requestId: context.requestId,
      });
      const translation = this.translation(params, options);
      work = isEventStream(invoked)
        ? collectResponse(invoked, translation)
        : invoked.then((final) => finalResultToResponse(final, translation));
      void work.then(
        () => {
          workSettled = true;
        },
        () => {
          workSettled = true;
        }
      );

      const response = await raceAbort(work, call.signal, 'messages.create', context.requestId);

      context.tokensIn = response.usage.input_tokens;
      context.tokensOut = response.usage.output_tokens;
      return response;
    } catch (err) {
      throw toGatewayError(err, 'BackendUnavailable');
    } finally {
      call.dispose();
      if (lease && work && !workSettled) {
        this.releaseAfter(work, lease);
      } else if (lease) {
        await this.pool.release(lease);
      }
    }
  }

  /**
   * Release once abandoned backend work settles, without holding up the
   * caller that gave up on it.
   */
  private releaseAfter(work: Promise<unknown>, lease: SessionLease): void {
    lazyLog(this.logger, 'debug', () => ({ sessionId: lease.sessionId }), 'Releasing session after backend work settles');
    void work
      .then(
        () => undefined,
        (err: unknown) => {
          lazyLog(this.logger, 'debug', () => ({ sessionId: lease.sessionId, error: describeError(err) }), 'Abandoned backend work failed');
        }
      )
      .then(() => this.pool.release(lease))
      .catch((err: unknown) => {
        this.logger?.error({ err, sessionId: lease.sessionId }, 'Deferred session release failed');
      });
  }

  /**
   * Resolve the model and record request facts on the context.
   */
  private prepare(request: MessagesRequest, context: RequestContext): MessageParams {
    const params: MessageParams = { ...request, model: this.resolveModel(request.model) };
    context.model = params.model;
    context.tokensIn = this.estimateInputTokens(params);
    return params;
  }

  private backendOptions(params: MessageParams): BackendOptions {
    const options: BackendOptions = {
      model: params.model,
      maxTurns: this.config.maxTurns,
    };
    if (this.config.systemPrompt !== undefined) {
      options.systemPrompt = this.config.systemPrompt;
    }
    if (this.config.allowedTools.length > 0) {
      options.allowedTools = [...this.config.allowedTools];
    }
    if (params.thinking) {
      options.maxThinkingTokens = params.thinking.budget_tokens;
    }
    return options;
  }

  private conversation(params: MessageParams): Conversation {
    return {
      messages: params.messages,
      system: params.system,
      model: params.model,
      maxTokens: params.max_tokens,
      stopSequences: params.stop_sequences,
      temperature: params.temperature,
      metadata: params.metadata,
    };
  }

  private translation(params: MessageParams, options: MessageCallOptions): TranslationOptions {
    return {
      model: params.model,
      mode: options.messageMode ?? this.config.messageMode,
      inputTokens: this.estimateInputTokens(params),
    };
  }

  private estimateInputTokens(params: Pick<MessageParams, 'system' | 'messages'>): number {
    let text = params.system ?? '';
    for (const message of params.messages) {
      if (typeof message.content === 'string') {
        text += message.content;
        continue;
      }
      for (const block of message.content) {
        if (block.type === 'text') {
          text += block.text;
        } else if (block.type === 'tool_result') {
          text += block.content;
        } else {
          text += JSON.stringify(block.input);
        }
      }
    }
    return estimateTokens(text);
  }
}
