import { describe, it, expect, beforeEach } from 'vitest';
import { AgentGateway } from '../../../src/services/gateway.js';
import { loadConfig, type Config } from '../../../src/config/loader.js';
import type { BatchResultLine } from '../../../src/types/batches.js';
import type { BatchEntryInput } from '../../../src/types/schemas/batches.js';
import {
  FakeBackend,
  MemoryLogSink,
  createCapturingLogger,
  deferred,
  flushMicrotasks,
  replyEvents,
  streamEvents,
} from '../../helpers/fake-backend.js';

function entry(customId: string): BatchEntryInput {
  return {
    custom_id: customId,
    params: { model: 'test-model', max_tokens: 32, messages: [{ role: 'user', content: `hi ${customId}` }] },
  };
}

describe('AgentGateway', () => {
  let backend: FakeBackend;
  let config: Config;
  let sink: MemoryLogSink;

  beforeEach(() => {
    backend = new FakeBackend();
    config = loadConfig(undefined, 'test', {});
    sink = new MemoryLogSink();
  });

  it('wires configuration into its components', () => {
    const gateway = new AgentGateway({ factory: backend, config, sink });

    expect(gateway.pool.getConfig()).toEqual({
      maxSessions: 4,
      ttlMs: 60_000,
      cleanupIntervalMs: 1_000,
      acquireTimeoutMs: 1_000,
    });
    expect(gateway.batches.getConfig().concurrency).toBe(2);
    expect(gateway.messages.getConfig().defaultModel).toBe('claude-sonnet-4-5-20250514');
    expect(gateway.messages.resolveModel('claude-opus-4-5')).toBe('claude-opus-4-5-20251101');
    expect(gateway.messages.getModel('claude-opus-4-5').display_name).toBe('Claude Opus 4.5');
  });

  it('serves messages through the pool', async () => {
    const gateway = new AgentGateway({ factory: backend, config, sink });

    const response = await gateway.messages.createMessage({
      model: 'test-model',
      max_tokens: 32,
      messages: [{ role: 'user', content: 'ping' }],
    });

    expect(response.content).toEqual([{ type: 'text', text: 'echo: ping' }]);
    expect(gateway.stats().pool).toMatchObject({ total: 1, active: 0, created: 1, acquired: 1 });
  });

  it('runs batch entries through the message service', async () => {
    const gateway = new AgentGateway({ factory: backend, config, sink });

    const job = gateway.batches.submit([entry('a'), entry('b')]);
    const lines: BatchResultLine[] = [];
    for await (const line of gateway.batches.results(job.id)) {
      lines.push(line);
    }

    expect(gateway.batches.status(job.id).status).toBe('ended');
    expect(lines.map((line) => line.custom_id).sort()).toEqual(['a', 'b']);
    const texts = lines.map((line) =>
      line.result.type === 'succeeded' ? line.result.message.content : line.result.type
    );
    expect(texts).toContainEqual([{ type: 'text', text: 'echo: hi a' }]);
    expect(texts).toContainEqual([{ type: 'text', text: 'echo: hi b' }]);

    const requests = sink.ofType('request_completed');
    expect(requests.map((record) => record.path)).toEqual(['/v1/messages/batches', '/v1/messages/batches']);
    const entries = sink.ofType('batch_entry_completed');
    expect(entries.map((record) => record.requestId).sort()).toEqual(
      requests.map((record) => record.requestId).sort()
    );
  });

  it('starts and stops once', async () => {
    const gateway = new AgentGateway({ factory: backend, config, sink });

    gateway.start();
    gateway.start();
    expect(gateway.isRunning()).toBe(true);

    await gateway.stop();

    expect(gateway.isRunning()).toBe(false);
    await expect(gateway.pool.acquire()).rejects.toMatchObject({ code: 'InvalidState' });
  });

  it('cancels running batch entries on stop', async () => {
    const hold = deferred();
    backend.script = (_conversation, options) => streamEvents(replyEvents('late'), options.signal, hold.promise);
    const gateway = new AgentGateway({ factory: backend, config, sink });
    gateway.start();

    const job = gateway.batches.submit([entry('a'), entry('b'), entry('c')]);
    await flushMicrotasks();
    await gateway.stop();

    const done = gateway.batches.status(job.id);
    expect(done.status).toBe('canceled');
    expect(done.requestCounts).toEqual({ processing: 0, succeeded: 0, errored: 0, canceled: 3, expired: 0 });
    expect(gateway.stats().pool.total).toBe(0);
  });

  it('logs completion records through pino when given a logger', async () => {
    const { logger, lines } = createCapturingLogger('info');
    const gateway = new AgentGateway({ factory: backend, config, logger });

    gateway.start();
    await gateway.messages.createMessage({
      model: 'test-model',
      max_tokens: 32,
      messages: [{ role: 'user', content: 'ping' }],
    });
    await gateway.stop();

    expect(lines.map((line) => line.msg)).toContain('Agent gateway started');
    expect(lines.find((line) => line.msg === 'request_completed')).toMatchObject({
      component: 'LogSink',
      outcome: 'success',
      model: 'test-model',
    });
  });
});
