import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  BatchEngine,
  formatResultLine,
  toMessageBatch,
  type BatchExecutor,
  type EntryExecution,
} from '../../../src/core/batch-engine.js';
import { GatewayError } from '../../../src/api/errors.js';
import type { BatchJob, BatchResultLine } from '../../../src/types/batches.js';
import type { MessagesResponse } from '../../../src/types/messages.js';
import type { BatchEntryInput } from '../../../src/types/schemas/batches.js';
import { MemoryLogSink, deferred, flushMicrotasks, type Deferred } from '../../helpers/fake-backend.js';

function reply(text: string): MessagesResponse {
  return {
    id: `msg_${text}`,
    type: 'message',
    role: 'assistant',
    content: [{ type: 'text', text }],
    model: 'test-model',
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: { input_tokens: 1, output_tokens: 1 },
  };
}

function request(customId: string): BatchEntryInput {
  return {
    custom_id: customId,
    params: { model: 'test-model', max_tokens: 16, messages: [{ role: 'user', content: `hi ${customId}` }] },
  };
}

/**
 * Executor whose calls stay pending until the test settles them. A call
 * rejects with the execution signal's reason when that signal aborts.
 */
class ControlledExecutor {
  public readonly calls: EntryExecution[] = [];
  private readonly pending = new Map<string, Deferred<MessagesResponse>>();

  public readonly run: BatchExecutor = (_params, execution) => {
    const call = deferred<MessagesResponse>();
    this.pending.set(execution.customId, call);
    this.calls.push(execution);
    execution.signal.addEventListener('abort', () => call.reject(execution.signal.reason), { once: true });
    return call.promise;
  };

  public started(): string[] {
    return this.calls.map((call) => call.customId);
  }

  public async succeed(customId: string): Promise<void> {
    this.take(customId).resolve(reply(customId));
    await flushMicrotasks();
  }

  public async fail(customId: string, error: unknown): Promise<void> {
    this.take(customId).reject(error);
    await flushMicrotasks();
  }

  private take(customId: string): Deferred<MessagesResponse> {
    const call = this.pending.get(customId);
    if (!call) {
      throw new Error(`No pending call for ${customId}`);
    }
    this.pending.delete(customId);
    return call;
  }
}

async function collect(lines: AsyncIterable<BatchResultLine>): Promise<BatchResultLine[]> {
  const out: BatchResultLine[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

describe('BatchEngine', () => {
  let executor: ControlledExecutor;
  let sink: MemoryLogSink;

  beforeEach(() => {
    executor = new ControlledExecutor();
    sink = new MemoryLogSink();
  });

  function createEngine(concurrency = 2, extra: { maxBatchSize?: number; retentionMs?: number } = {}): BatchEngine {
    return new BatchEngine({ executor: executor.run, sink, concurrency, sweepIntervalMs: 1_000, ...extra });
  }

  describe('submit', () => {
    it('returns an in_progress snapshot at once', () => {
      const engine = createEngine();

      const job = engine.submit([request('a'), request('b')]);

      expect(job.id).toMatch(/^msgbatch_[0-9a-f]{24}$/);
      expect(job.status).toBe('in_progress');
      expect(job.requestCounts).toEqual({ processing: 2, succeeded: 0, errored: 0, canceled: 0, expired: 0 });
      expect(job.expiresAt - job.createdAt).toBe(29 * 24 * 3_600_000);
    });

    it('rejects oversized batches', () => {
      const engine = createEngine(2, { maxBatchSize: 2 });

      expect(() => engine.submit([request('a'), request('b'), request('c')])).toThrow(
        'Batch exceeds maximum size of 2 requests'
      );
    });

    it('rejects empty batches and duplicate custom ids', () => {
      const engine = createEngine();

      expect(() => engine.submit([])).toThrow(
        "Validation error on field 'requests': A batch needs at least one request"
      );
      expect(() => engine.submit([request('a'), request('a')])).toThrow(
        "Validation error on field 'requests.1.custom_id': Duplicate custom_id 'a'"
      );
      expect(engine.list().data).toEqual([]);
    });

    it('hands each entry its own request context', async () => {
      const engine = createEngine();

      const job = engine.submit([request('a')]);
      await flushMicrotasks();

      expect(executor.calls).toHaveLength(1);
      expect(executor.calls[0]).toMatchObject({ batchId: job.id, customId: 'a' });
      expect(executor.calls[0]?.context.path).toBe('/v1/messages/batches');
      expect(executor.calls[0]?.context.model).toBe('test-model');
    });
  });

  describe('execution', () => {
    it('ends the job once every entry succeeds', async () => {
      const engine = createEngine();
      const ended = vi.fn();
      engine.on('jobEnded', ended);
      const job = engine.submit([request('a'), request('b')]);
      await flushMicrotasks();

      await executor.succeed('a');
      expect(engine.status(job.id).status).toBe('in_progress');
      await executor.succeed('b');

      const done = engine.status(job.id);
      expect(done.status).toBe('ended');
      expect(done.requestCounts).toEqual({ processing: 0, succeeded: 2, errored: 0, canceled: 0, expired: 0 });
      expect(done.endedAt).toBeDefined();
      expect(done.entries[0]?.result).toEqual({ type: 'succeeded', message: reply('a') });
      expect(ended).toHaveBeenCalledWith(job.id);
      expect(sink.ofType('batch_entry_completed').map((record) => record.customId)).toEqual(['a', 'b']);
      expect(sink.ofType('batch_completed')).toEqual([
        expect.objectContaining({ batchId: job.id, status: 'ended', succeeded: 2, errored: 0 }),
      ]);
    });

    it('never runs more entries than the concurrency limit', async () => {
      const engine = createEngine(1);
      engine.submit([request('a'), request('b'), request('c')]);
      await flushMicrotasks();

      expect(executor.started()).toEqual(['a']);
      expect(engine.stats().runningEntries).toBe(1);

      await executor.succeed('a');
      expect(executor.started()).toEqual(['a', 'b']);
      expect(engine.stats().gate).toMatchObject({ active: 1, queued: 1, peakActive: 1 });
    });

    it('records a failing entry without affecting its siblings', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a'), request('b')]);
      await flushMicrotasks();

      await executor.fail('a', new GatewayError('BackendUnavailable', 'down'));
      await executor.succeed('b');

      const done = engine.status(job.id);
      expect(done.status).toBe('ended');
      expect(done.entries[0]?.result).toEqual({
        type: 'errored',
        error: { type: 'overloaded_error', message: 'down' },
      });
      expect(done.requestCounts).toMatchObject({ succeeded: 1, errored: 1 });
      const [record] = sink.ofType('batch_entry_completed');
      expect(record).toMatchObject({ customId: 'a', result: 'errored', error: 'BackendUnavailable: down' });
      expect(record?.requestId).toMatch(/^req_/);
    });

    it('maps unknown executor failures to api_error', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a')]);
      await flushMicrotasks();

      await executor.fail('a', new Error('unexpected'));

      expect(engine.status(job.id).entries[0]?.result).toEqual({
        type: 'errored',
        error: { type: 'api_error', message: 'unexpected' },
      });
    });
  });

  describe('scenarios', () => {
    it('runs five entries at most two at a time', async () => {
      const engine = createEngine(2);
      const ids = ['e1', 'e2', 'e3', 'e4', 'e5'];
      const job = engine.submit(ids.map((id) => request(id)));
      await flushMicrotasks();

      let peakRunning = 0;
      for (const id of ids) {
        peakRunning = Math.max(peakRunning, engine.stats().runningEntries);
        await executor.succeed(id);
      }

      const done = engine.status(job.id);
      expect(done.status).toBe('ended');
      expect(done.requestCounts.succeeded).toBe(5);
      expect(peakRunning).toBe(2);
      expect(engine.stats().gate.peakActive).toBe(2);
    });

    it('cancels the rest of a job after its first entry completes', async () => {
      const engine = createEngine(1);
      const ids = ['e1', 'e2', 'e3', 'e4', 'e5'];
      const job = engine.submit(ids.map((id) => request(id)));
      engine.on('entryCompleted', (batchId, customId) => {
        if (customId === 'e1') {
          engine.cancel(batchId);
        }
      });
      await flushMicrotasks();

      await executor.succeed('e1');

      const lines = await collect(engine.results(job.id));
      expect(lines).toEqual([
        { custom_id: 'e1', result: { type: 'succeeded', message: reply('e1') } },
        ...ids.slice(1).map((id) => ({ custom_id: id, result: { type: 'canceled' } })),
      ]);
      expect(engine.status(job.id).status).toBe('canceled');
      expect(executor.started()).toEqual(['e1']);
    });
  });

  describe('cancel', () => {
    it('cancels pending entries and waits for running ones', async () => {
      const engine = createEngine(1);
      const canceled = vi.fn();
      engine.on('jobCanceled', canceled);
      const job = engine.submit([request('a'), request('b'), request('c')]);
      await flushMicrotasks();

      const canceling = engine.cancel(job.id);
      expect(canceling.status).toBe('canceling');
      expect(canceling.cancelInitiatedAt).toBeDefined();
      expect(canceling.requestCounts).toEqual({ processing: 1, succeeded: 0, errored: 0, canceled: 2, expired: 0 });
      expect(toMessageBatch(canceling).processing_status).toBe('canceling');
      expect(engine.cancel(job.id).status).toBe('canceling');

      await executor.succeed('a');

      const done = engine.status(job.id);
      expect(done.status).toBe('canceled');
      expect(done.entries.map((entry) => entry.result.type)).toEqual(['succeeded', 'canceled', 'canceled']);
      expect(executor.started()).toEqual(['a']);
      expect(canceled).toHaveBeenCalledWith(job.id);
      expect(engine.stats().gate).toMatchObject({ active: 0, queued: 0 });
    });

    it('finishes at once when nothing has started', () => {
      const engine = createEngine();
      const job = engine.submit([request('a'), request('b')]);

      const result = engine.cancel(job.id);

      expect(result.status).toBe('canceled');
      expect(result.requestCounts.canceled).toBe(2);
      expect(toMessageBatch(result).processing_status).toBe('ended');
    });

    it('leaves ended jobs unchanged', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a')]);
      await flushMicrotasks();
      await executor.succeed('a');

      expect(engine.cancel(job.id).status).toBe('ended');
    });

    it('fails for unknown batches', () => {
      const engine = createEngine();

      expect(() => engine.cancel('msgbatch_missing')).toThrow(GatewayError);
      expect(() => engine.status('msgbatch_missing')).toThrow('Batch not found: msgbatch_missing');
    });
  });

  describe('results', () => {
    it('streams results in completion order as entries finish', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a'), request('b')]);
      await flushMicrotasks();

      const lines = collect(engine.results(job.id));
      await executor.succeed('b');
      await executor.fail('a', new GatewayError('BackendTimeout', 'slow'));

      expect(await lines).toEqual([
        { custom_id: 'b', result: { type: 'succeeded', message: reply('b') } },
        { custom_id: 'a', result: { type: 'errored', error: { type: 'timeout_error', message: 'slow' } } },
      ]);
    });

    it('throws BatchNotFound before iteration', () => {
      const engine = createEngine();

      expect(() => engine.results('msgbatch_missing')).toThrow('Batch not found: msgbatch_missing');
    });

    it('stops waiting when the reader aborts', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a')]);
      await flushMicrotasks();
      const controller = new AbortController();

      const lines = collect(engine.results(job.id, { signal: controller.signal }));
      await flushMicrotasks();
      controller.abort();

      await expect(lines).rejects.toMatchObject({ code: 'Canceled' });
    });

    it('renders JSONL lines', async () => {
      const engine = createEngine();
      const job = engine.submit([request('a')]);
      await flushMicrotasks();
      await executor.succeed('a');

      const lines: string[] = [];
      for await (const line of engine.resultsJsonl(job.id)) {
        lines.push(line);
      }

      expect(lines).toEqual([
        formatResultLine({ custom_id: 'a', result: { type: 'succeeded', message: reply('a') } }),
      ]);
      expect(lines[0]?.endsWith('}\n')).toBe(true);
    });
  });

  describe('list and delete', () => {
    it('lists newest first with cursors', () => {
      const engine = createEngine();
      const first = engine.submit([request('a')]);
      const second = engine.submit([request('a')]);
      const third = engine.submit([request('a')]);

      const page = engine.list({ limit: 2 });
      expect(page.data.map((job) => job.id)).toEqual([third.id, second.id]);
      expect(page).toMatchObject({ hasMore: true, firstId: third.id, lastId: second.id });

      const next = engine.list({ limit: 2, afterId: second.id });
      expect(next.data.map((job) => job.id)).toEqual([first.id]);
      expect(next.hasMore).toBe(false);

      expect(engine.list({ beforeId: second.id }).data.map((job) => job.id)).toEqual([third.id]);
    });

    it('validates the list limit', () => {
      const engine = createEngine();

      expect(() => engine.list({ limit: 0 })).toThrow('limit must be an integer between 1 and 1000');
      expect(() => engine.list({ limit: 1001 })).toThrow(GatewayError);
    });

    it('deletes only ended jobs', async () => {
      const engine = createEngine();
      const purged = vi.fn();
      engine.on('jobPurged', purged);
      const job = engine.submit([request('a')]);
      await flushMicrotasks();

      expect(() => engine.delete(job.id)).toThrow(`Cannot delete batch that is not ended: ${job.id}`);

      await executor.succeed('a');
      engine.delete(job.id);

      expect(() => engine.status(job.id)).toThrow('Batch not found');
      expect(purged).toHaveBeenCalledWith(job.id, 'deleted');
    });
  });

  describe('retention', () => {
    it('purges ended jobs past their expiry', async () => {
      const engine = createEngine(2, { retentionMs: 1_000 });
      const purged = vi.fn();
      engine.on('jobPurged', purged);
      const job = engine.submit([request('a')]);
      await flushMicrotasks();
      await executor.succeed('a');

      expect(engine.sweep(job.expiresAt)).toEqual({ purged: 0, expiredEntries: 0 });
      expect(engine.sweep(job.expiresAt + 1)).toEqual({ purged: 1, expiredEntries: 0 });
      expect(purged).toHaveBeenCalledWith(job.id, 'expired');
      expect(engine.stats().jobs).toBe(0);
    });

    it('expires pending entries of unfinished jobs', async () => {
      const engine = createEngine(1, { retentionMs: 1_000 });
      const job = engine.submit([request('a'), request('b')]);
      await flushMicrotasks();

      expect(engine.sweep(job.expiresAt + 1)).toEqual({ purged: 0, expiredEntries: 1 });
      await executor.succeed('a');

      const done = engine.status(job.id);
      expect(done.status).toBe('ended');
      expect(done.requestCounts).toEqual({ processing: 0, succeeded: 1, errored: 0, canceled: 0, expired: 1 });
      expect(executor.started()).toEqual(['a']);
    });
  });

  describe('stop', () => {
    it('cancels unfinished jobs and interrupts running entries', async () => {
      const engine = createEngine(1);
      const job = engine.submit([request('a'), request('b')]);
      await flushMicrotasks();

      await engine.stop();

      const done = engine.status(job.id);
      expect(done.status).toBe('canceled');
      expect(done.entries.map((entry) => entry.result.type)).toEqual(['canceled', 'canceled']);
      expect(engine.stats().byStatus).toEqual({ in_progress: 0, canceling: 0, ended: 0, canceled: 1 });
    });
  });
});

describe('toMessageBatch', () => {
  const base: BatchJob = {
    id: 'msgbatch_000000000000000000000001',
    status: 'ended',
    createdAt: Date.parse('2026-01-01T00:00:00Z'),
    expiresAt: Date.parse('2026-01-30T00:00:00Z'),
    endedAt: Date.parse('2026-01-01T00:01:00Z'),
    requestCounts: { processing: 0, succeeded: 1, errored: 0, canceled: 0, expired: 0 },
    entries: [],
  };

  it('renders ended jobs with a results url', () => {
    expect(toMessageBatch(base, 'http://localhost:8787')).toEqual({
      id: 'msgbatch_000000000000000000000001',
      type: 'message_batch',
      processing_status: 'ended',
      request_counts: { processing: 0, succeeded: 1, errored: 0, canceled: 0, expired: 0 },
      created_at: '2026-01-01T00:00:00.000Z',
      ended_at: '2026-01-01T00:01:00.000Z',
      expires_at: '2026-01-30T00:00:00.000Z',
      archived_at: null,
      cancel_initiated_at: null,
      results_url: 'http://localhost:8787/v1/messages/batches/msgbatch_000000000000000000000001/results',
    });
  });

  it('has no results url while in progress', () => {
    const batch = toMessageBatch({ ...base, status: 'in_progress', endedAt: undefined });

    expect(batch.processing_status).toBe('in_progress');
    expect(batch.results_url).toBeNull();
    expect(batch.ended_at).toBeNull();
  });
});
