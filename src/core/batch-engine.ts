/**
 * Batch Processing Engine
 *
 * Runs the independent Messages requests of a batch job under one
 * engine-wide concurrency limit and tracks each job through its status
 * state machine:
 *
 *   in_progress ──(all entries terminal)──────────────> ended
 *        │
 *        └─(cancel)─> canceling ──(last running entry settles)──> canceled
 *
 * Entry execution takes a concurrency slot first and only then a session
 * (through the injected executor), so slot holders never wait on sessions
 * held by slot waiters. A failing entry is recorded as `errored` and never
 * affects its siblings.
 *
 * Jobs stay queryable until `expiresAt`; the retention sweep purges ended
 * jobs past it and marks still-pending entries of unfinished ones `expired`.
 */

import { randomBytes } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { BATCH } from '../config/defaults.js';
import { GatewayError, describeError, toGatewayError, zodErrorToGatewayError } from '../api/errors.js';
import { CreateBatchRequestSchema, type BatchEntryInput } from '../types/schemas/batches.js';
import type { MessageParams } from '../types/schemas/messages.js';
import type { MessagesResponse } from '../types/messages.js';
import type {
  BatchEntry,
  BatchJob,
  BatchListOptions,
  BatchListPage,
  BatchResultLine,
  BatchStatus,
  MessageBatch,
  RequestCounts,
  TerminalBatchResult,
} from '../types/batches.js';
import { NoopLogSink, recordSafely, type LogSink } from '../telemetry/log-sink.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { abortReason } from '../utils/abort.js';
import { ConcurrencyGate, type ConcurrencyGateStats } from './concurrency-gate.js';
import { createRequestContext, type RequestContext } from './request-context.js';

export interface BatchEngineConfig {
  concurrency: number;
  maxBatchSize: number;
  retentionMs: number;
  sweepIntervalMs: number;
}

export interface EntryExecution {
  batchId: string;
  customId: string;
  /** Aborted when the engine stops */
  signal: AbortSignal;
  context: RequestContext;
}

/**
 * Runs one entry's request. Normally backed by the message service with an
 * ephemeral session.
 */
export type BatchExecutor = (params: MessageParams, execution: EntryExecution) => Promise<MessagesResponse>;

export interface BatchEngineOptions extends Partial<BatchEngineConfig> {
  executor: BatchExecutor;
  sink?: LogSink;
  logger?: Logger;
}

export interface ResultsOptions {
  signal?: AbortSignal;
}

export type PurgeReason = 'expired' | 'deleted';

export interface BatchEngineEvents {
  jobSubmitted: (job: BatchJob) => void;
  entryCompleted: (batchId: string, customId: string, result: TerminalBatchResult['type']) => void;
  jobEnded: (batchId: string) => void;
  jobCanceled: (batchId: string) => void;
  jobPurged: (batchId: string, reason: PurgeReason) => void;
}

export interface BatchEngineStats {
  jobs: number;
  byStatus: Record<BatchStatus, number>;
  runningEntries: number;
  gate: ConcurrencyGateStats;
}

export interface SweepResult {
  purged: number;
  expiredEntries: number;
}

/**
 * Mutable job state. Never handed out; callers get BatchJob snapshots.
 */
interface JobRecord {
  id: string;
  seq: number;
  status: BatchStatus;
  createdAt: number;
  expiresAt: number;
  endedAt?: number;
  cancelInitiatedAt?: number;
  entries: BatchEntry[];
  /** Entry indices in the order they became terminal */
  completionOrder: number[];
  running: number;
  /** Aborted on cancel, expiry and stop: releases entries still queued at the gate */
  admission: AbortController;
  /** Aborted on stop: interrupts running entries */
  execution: AbortController;
  tasks: Promise<void>[];
  listeners: Set<() => void>;
}

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 1000;

export function generateBatchId(): string {
  return `msgbatch_${randomBytes(12).toString('hex')}`;
}

export function isTerminalStatus(status: BatchStatus): boolean {
  return status === 'ended' || status === 'canceled';
}

/**
 * One JSONL results line.
 */
export function formatResultLine(line: BatchResultLine): string {
  return `${JSON.stringify(line)}\n`;
}

function toIso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

/**
 * Render a job as an Anthropic `message_batch` object.
 */
export function toMessageBatch(job: BatchJob, baseUrl = ''): MessageBatch {
  const terminal = isTerminalStatus(job.status);
  return {
    id: job.id,
    type: 'message_batch',
    processing_status: terminal ? 'ended' : job.status === 'canceling' ? 'canceling' : 'in_progress',
    request_counts: { ...job.requestCounts },
    created_at: new Date(job.createdAt).toISOString(),
    ended_at: toIso(job.endedAt),
    expires_at: new Date(job.expiresAt).toISOString(),
    archived_at: null,
    cancel_initiated_at: toIso(job.cancelInitiatedAt),
    results_url: terminal ? `${baseUrl}/v1/messages/batches/${job.id}/results` : null,
  };
}

function countEntries(entries: ReadonlyArray<BatchEntry>): RequestCounts {
  const counts: RequestCounts = { processing: 0, succeeded: 0, errored: 0, canceled: 0, expired: 0 };
  for (const entry of entries) {
    switch (entry.result.type) {
      case 'pending':
        counts.processing++;
        break;
      case 'succeeded':
        counts.succeeded++;
        break;
      case 'errored':
        counts.errored++;
        break;
      case 'canceled':
        counts.canceled++;
        break;
      case 'expired':
        counts.expired++;
        break;
    }
  }
  return counts;
}

export class BatchEngine extends EventEmitter<BatchEngineEvents> {
  private readonly config: BatchEngineConfig;
  private readonly executor: BatchExecutor;
  private readonly sink: LogSink;
  private readonly logger?: Logger;
  private readonly gate: ConcurrencyGate;
  private readonly sweeper = new TimerGuard();
  private readonly jobs = new Map<string, JobRecord>();
  private sequence = 0;

  constructor(options: BatchEngineOptions) {
    super();
    this.executor = options.executor;
    this.sink = options.sink ?? new NoopLogSink();
    this.logger = options.logger;
    this.config = {
      concurrency: options.concurrency ?? BATCH.CONCURRENCY,
      maxBatchSize: options.maxBatchSize ?? BATCH.MAX_BATCH_SIZE,
      retentionMs: options.retentionMs ?? BATCH.RETENTION_MS,
      sweepIntervalMs: options.sweepIntervalMs ?? BATCH.SWEEP_INTERVAL_MS,
    };
    this.gate = new ConcurrencyGate(this.config.concurrency, this.logger);
  }

  /**
   * Start the retention sweep. Idempotent.
   */
  public start(): void {
    if (this.sweeper.isActive()) {
      return;
    }
    this.sweeper.setInterval(() => {
      this.sweep();
    }, this.config.sweepIntervalMs);
    this.logger?.info({ config: this.config }, 'Batch engine started');
  }

  /**
   * Stop the sweep, cancel unfinished jobs, interrupt running entries and
   * wait for every entry task to settle.
   */
  public async stop(): Promise<void> {
    this.sweeper.clear();

    const tasks: Promise<void>[] = [];
    for (const job of this.jobs.values()) {
      if (job.status === 'in_progress') {
        this.cancelJob(job);
      }
      if (!isTerminalStatus(job.status)) {
        job.execution.abort(new GatewayError('Canceled', 'Batch engine stopped', { batchId: job.id }));
      }
      tasks.push(...job.tasks);
    }

    await Promise.allSettled(tasks);
    this.logger?.info({ jobs: this.jobs.size }, 'Batch engine stopped');
  }

  /**
   * Validate and schedule a job. Returns immediately with an `in_progress`
   * snapshot.
   *
   * @throws GatewayError InvalidParams on an empty, oversized or
   *   duplicate-id batch
   */
  public submit(requests: BatchEntryInput[]): BatchJob {
    if (requests.length > this.config.maxBatchSize) {
      throw new GatewayError(
        'InvalidParams',
        `Batch exceeds maximum size of ${this.config.maxBatchSize} requests`,
        { size: requests.length, maxBatchSize: this.config.maxBatchSize }
      );
    }

    const parsed = CreateBatchRequestSchema.safeParse({ requests });
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error);
    }

    const now = Date.now();
    const job: JobRecord = {
      id: this.nextBatchId(),
      seq: ++this.sequence,
      status: 'in_progress',
      createdAt: now,
      expiresAt: now + this.config.retentionMs,
      entries: parsed.data.requests.map((request) => ({
        customId: request.custom_id,
        params: request.params,
        state: 'pending',
        result: { type: 'pending' },
      })),
      completionOrder: [],
      running: 0,
      admission: new AbortController(),
      execution: new AbortController(),
      tasks: [],
      listeners: new Set(),
    };
    this.jobs.set(job.id, job);

    job.tasks = job.entries.map((_entry, index) => this.runEntry(job, index));

    const snapshot = this.snapshot(job);
    try {
      this.emit('jobSubmitted', snapshot);
    } catch (err) {
      this.logger?.error({ err, batchId: job.id }, 'Error emitting jobSubmitted event');
    }
    this.logger?.info({ batchId: job.id, entries: job.entries.length }, 'Batch submitted');
    return snapshot;
  }

  /**
   * @throws GatewayError BatchNotFound
   */
  public status(batchId: string): BatchJob {
    return this.snapshot(this.requireJob(batchId));
  }

  /**
   * Request cancellation. Pending entries are canceled at once; running
   * ones finish and the job turns `canceled` when the last settles.
   * Canceling a job that is already canceling or terminal returns it
   * unchanged.
   */
  public cancel(batchId: string): BatchJob {
    const job = this.requireJob(batchId);
    if (job.status === 'in_progress') {
      this.cancelJob(job);
      this.logger?.info({ batchId, running: job.running }, 'Canceling batch');
    }
    return this.snapshot(job);
  }

  /**
   * Terminal results in completion order. Waits for unfinished entries;
   * ends once the job is terminal. Each call starts a fresh pass.
   *
   * @throws GatewayError BatchNotFound (eagerly, before iteration)
   */
  public results(batchId: string, options: ResultsOptions = {}): AsyncIterable<BatchResultLine> {
    const job = this.requireJob(batchId);
    return this.iterateResults(job, options.signal);
  }

  /**
   * Results as JSONL lines (each ends with a newline).
   */
  public async *resultsJsonl(batchId: string, options: ResultsOptions = {}): AsyncGenerator<string, void, undefined> {
    for await (const line of this.results(batchId, options)) {
      yield formatResultLine(line);
    }
  }

  /**
   * Newest first, cursor-paginated by job id.
   */
  public list(options: BatchListOptions = {}): BatchListPage {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new GatewayError('InvalidParams', `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, {
        limit,
      });
    }

    let jobs = Array.from(this.jobs.values()).sort(
      (a, b) => b.createdAt - a.createdAt || b.seq - a.seq
    );

    if (options.afterId) {
      const index = jobs.findIndex((job) => job.id === options.afterId);
      if (index !== -1) {
        jobs = jobs.slice(index + 1);
      }
    }

    if (options.beforeId) {
      const index = jobs.findIndex((job) => job.id === options.beforeId);
      if (index !== -1) {
        jobs = jobs.slice(0, index);
      }
    }

    const page = jobs.slice(0, limit).map((job) => this.snapshot(job));
    return {
      data: page,
      hasMore: jobs.length > limit,
      firstId: page[0]?.id ?? null,
      lastId: page[page.length - 1]?.id ?? null,
    };
  }

  /**
   * Remove a terminal job and its results.
   *
   * @throws GatewayError BatchNotFound, or InvalidState while unfinished
   */
  public delete(batchId: string): void {
    const job = this.requireJob(batchId);
    if (!isTerminalStatus(job.status)) {
      throw new GatewayError('InvalidState', `Cannot delete batch that is not ended: ${batchId}`, {
        batchId,
        status: job.status,
      });
    }
    this.purge(job, 'deleted');
  }

  /**
   * One retention pass.
   */
  public sweep(now = Date.now()): SweepResult {
    let purged = 0;
    let expiredEntries = 0;

    for (const job of Array.from(this.jobs.values())) {
      if (now <= job.expiresAt) {
        continue;
      }
      if (isTerminalStatus(job.status)) {
        this.purge(job, 'expired');
        purged++;
      } else {
        expiredEntries += this.expireJob(job);
      }
    }

    if (purged > 0 || expiredEntries > 0) {
      this.logger?.info({ purged, expiredEntries }, 'Batch retention sweep');
    }
    return { purged, expiredEntries };
  }

  public stats(): BatchEngineStats {
    const byStatus: Record<BatchStatus, number> = { in_progress: 0, canceling: 0, ended: 0, canceled: 0 };
    let runningEntries = 0;
    for (const job of this.jobs.values()) {
      byStatus[job.status]++;
      runningEntries += job.running;
    }
    return { jobs: this.jobs.size, byStatus, runningEntries, gate: this.gate.getStats() };
  }

  public getConfig(): Readonly<BatchEngineConfig> {
    return this.config;
  }

  private nextBatchId(): string {
    let id: string;
    do {
      id = generateBatchId();
    } while (this.jobs.has(id));
    return id;
  }

  private requireJob(batchId: string): JobRecord {
    const job = this.jobs.get(batchId);
    if (!job) {
      throw new GatewayError('BatchNotFound', `Batch not found: ${batchId}`, { batchId });
    }
    return job;
  }

  private snapshot(job: JobRecord): BatchJob {
    return {
      id: job.id,
      status: job.status,
      createdAt: job.createdAt,
      expiresAt: job.expiresAt,
      endedAt: job.endedAt,
      cancelInitiatedAt: job.cancelInitiatedAt,
      requestCounts: countEntries(job.entries),
      entries: job.entries.map((entry) => ({ ...entry })),
    };
  }

  /**
   * Execute one entry: slot, then executor. Never rejects.
   */
  private async runEntry(job: JobRecord, index: number): Promise<void> {
    const entry = job.entries[index];
    if (!entry) {
      return;
    }
    const holderId = `${job.id}:${index}`;

    try {
      await this.gate.acquire(holderId, job.admission.signal);
    } catch (err) {
      // Left the queue: the entry was settled by cancel, expiry or stop
      if (entry.state === 'pending') {
        this.settle(job, index, { type: 'canceled' }, err);
      }
      return;
    }

    try {
      if (entry.state !== 'pending') {
        return;
      }
      entry.state = 'running';
      entry.startedAt = Date.now();
      job.running++;

      const context = createRequestContext({
        path: '/v1/messages/batches',
        method: 'POST',
        model: entry.params.model,
      });

      let result: TerminalBatchResult;
      let failure: unknown;
      try {
        const message = await this.executor(entry.params, {
          batchId: job.id,
          customId: entry.customId,
          signal: job.execution.signal,
          context,
        });
        result = { type: 'succeeded', message };
      } catch (err) {
        failure = err;
        const error = toGatewayError(err);
        result =
          error.code === 'Canceled' && job.execution.signal.aborted
            ? { type: 'canceled' }
            : { type: 'errored', error: { type: error.anthropicType, message: error.message } };
        this.logger?.warn(
          { batchId: job.id, customId: entry.customId, error: describeError(err) },
          'Batch entry failed'
        );
      }

      job.running--;
      this.settle(job, index, result, failure, context.requestId);
    } catch (err) {
      this.logger?.error({ err, batchId: job.id, customId: entry.customId }, 'Batch entry bookkeeping failed');
    } finally {
      this.gate.release(holderId);
    }
  }

  /**
   * Make an entry terminal, record it, wake result readers and finalize the
   * job once nothing is pending or running.
   */
  private settle(
    job: JobRecord,
    index: number,
    result: TerminalBatchResult,
    error?: unknown,
    requestId = ''
  ): void {
    const entry = job.entries[index];
    if (!entry || entry.state === 'terminal') {
      return;
    }

    const now = Date.now();
    entry.state = 'terminal';
    entry.result = result;
    entry.completedAt = now;
    job.completionOrder.push(index);

    recordSafely(
      this.sink,
      {
        event: 'batch_entry_completed',
        batchId: job.id,
        customId: entry.customId,
        requestId,
        result: result.type,
        durationMs: entry.startedAt === undefined ? 0 : now - entry.startedAt,
        error: result.type === 'errored' && error !== undefined ? describeError(error) : null,
        timestamp: new Date(now).toISOString(),
      },
      this.logger
    );

    try {
      this.emit('entryCompleted', job.id, entry.customId, result.type);
    } catch (err) {
      this.logger?.error({ err, batchId: job.id }, 'Error emitting entryCompleted event');
    }

    this.maybeFinalize(job);
    this.notify(job);
  }

  private maybeFinalize(job: JobRecord): void {
    if (isTerminalStatus(job.status) || job.running > 0) {
      return;
    }
    if (job.entries.some((entry) => entry.state !== 'terminal')) {
      return;
    }

    const now = Date.now();
    const canceled = job.status === 'canceling';
    job.status = canceled ? 'canceled' : 'ended';
    job.endedAt = now;

    const counts = countEntries(job.entries);
    recordSafely(
      this.sink,
      {
        event: 'batch_completed',
        batchId: job.id,
        status: canceled ? 'canceled' : 'ended',
        succeeded: counts.succeeded,
        errored: counts.errored,
        canceled: counts.canceled,
        expired: counts.expired,
        durationMs: now - job.createdAt,
        timestamp: new Date(now).toISOString(),
      },
      this.logger
    );

    try {
      if (canceled) {
        this.emit('jobCanceled', job.id);
      } else {
        this.emit('jobEnded', job.id);
      }
    } catch (err) {
      this.logger?.error({ err, batchId: job.id }, 'Error emitting job completion event');
    }

    this.logger?.info({ batchId: job.id, status: job.status, counts }, 'Batch completed');
  }

  private cancelJob(job: JobRecord): void {
    job.status = 'canceling';
    job.cancelInitiatedAt = Date.now();
    this.settlePending(job, { type: 'canceled' });
    job.admission.abort(new GatewayError('Canceled', `Batch canceled: ${job.id}`, { batchId: job.id }));
    this.maybeFinalize(job);
    this.notify(job);
  }

  private expireJob(job: JobRecord): number {
    const expired = this.settlePending(job, { type: 'expired' });
    job.admission.abort(new GatewayError('Canceled', `Batch expired: ${job.id}`, { batchId: job.id }));
    this.maybeFinalize(job);
    return expired;
  }

  private settlePending(job: JobRecord, result: TerminalBatchResult): number {
    let settled = 0;
    job.entries.forEach((entry, index) => {
      if (entry.state === 'pending') {
        this.settle(job, index, result);
        settled++;
      }
    });
    return settled;
  }

  private purge(job: JobRecord, reason: PurgeReason): void {
    this.jobs.delete(job.id);
    this.notify(job);
    try {
      this.emit('jobPurged', job.id, reason);
    } catch (err) {
      this.logger?.error({ err, batchId: job.id }, 'Error emitting jobPurged event');
    }
    this.logger?.debug({ batchId: job.id, reason }, 'Batch purged');
  }

  private notify(job: JobRecord): void {
    const listeners = Array.from(job.listeners);
    job.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  private async *iterateResults(
    job: JobRecord,
    signal: AbortSignal | undefined
  ): AsyncGenerator<BatchResultLine, void, undefined> {
    let cursor = 0;
    for (;;) {
      while (cursor < job.completionOrder.length) {
        const entry = job.entries[job.completionOrder[cursor] ?? -1];
        cursor++;
        if (entry && entry.result.type !== 'pending') {
          yield { custom_id: entry.customId, result: entry.result };
        }
      }

      if (isTerminalStatus(job.status) || !this.jobs.has(job.id)) {
        return;
      }
      await this.waitForProgress(job, signal);
    }
  }

  private waitForProgress(job: JobRecord, signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal, 'batch results', job.id));
        return;
      }
      const onAbort = (): void => {
        job.listeners.delete(onProgress);
        reject(abortReason(signal, 'batch results', job.id));
      };
      const onProgress = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      job.listeners.add(onProgress);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
