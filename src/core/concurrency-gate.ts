/**
 * Concurrency Gate
 *
 * Engine-wide admission limit for batch entries. At most `limit` holders
 * run at once; overflow waits in a FIFO queue and is admitted as slots are
 * released. A queued caller leaves the queue when its AbortSignal fires.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { GatewayError } from '../api/errors.js';
import { abortReason } from '../utils/abort.js';

interface QueuedHolder {
  holderId: string;
  enqueuedAt: number;
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export interface ConcurrencyGateEvents {
  admitted: (holderId: string, active: number) => void;
  queued: (holderId: string, queueDepth: number) => void;
  released: (holderId: string, active: number) => void;
}

export interface ConcurrencyGateStats {
  limit: number;
  active: number;
  queued: number;
  peakActive: number;
  totalAdmitted: number;
  totalReleased: number;
  totalAborted: number;
}

export class ConcurrencyGate extends EventEmitter<ConcurrencyGateEvents> {
  private readonly limit: number;
  private readonly logger?: Logger;
  private readonly active = new Set<string>();
  private readonly queue: QueuedHolder[] = [];

  // Statistics
  private peakActive = 0;
  private totalAdmitted = 0;
  private totalReleased = 0;
  private totalAborted = 0;

  constructor(limit: number, logger?: Logger) {
    super();
    if (!Number.isInteger(limit) || limit < 1) {
      throw new GatewayError('InvalidParams', `Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.logger = logger;
  }

  /**
   * Take a slot, waiting in FIFO order when all are held.
   *
   * @throws GatewayError Canceled (or the signal's GatewayError reason) on abort
   */
  public acquire(holderId: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal, 'concurrency gate', holderId));
    }

    if (this.active.has(holderId)) {
      return Promise.reject(
        new GatewayError('InvalidState', `Holder already admitted: ${holderId}`, { holderId })
      );
    }

    if (this.active.size < this.limit && this.queue.length === 0) {
      this.admit(holderId);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const queued: QueuedHolder = {
        holderId,
        enqueuedAt: Date.now(),
        resolve,
        reject,
        signal,
      };

      if (signal) {
        queued.onAbort = () => {
          const index = this.queue.indexOf(queued);
          if (index !== -1) {
            this.queue.splice(index, 1);
            this.totalAborted++;
            reject(abortReason(signal, 'concurrency gate', holderId));
          }
        };
        signal.addEventListener('abort', queued.onAbort, { once: true });
      }

      this.queue.push(queued);

      try {
        this.emit('queued', holderId, this.queue.length);
      } catch (err) {
        this.logger?.error({ err, holderId }, 'Error emitting queued event');
      }

      this.logger?.debug(
        { holderId, queueDepth: this.queue.length, active: this.active.size, limit: this.limit },
        'Holder queued (at concurrency limit)'
      );
    });
  }

  /**
   * Give a slot back and admit the next queued holder.
   */
  public release(holderId: string): void {
    if (!this.active.delete(holderId)) {
      this.logger?.warn({ holderId }, 'Attempted to release non-active holder');
      return;
    }

    this.totalReleased++;

    try {
      this.emit('released', holderId, this.active.size);
    } catch (err) {
      this.logger?.error({ err, holderId }, 'Error emitting released event');
    }

    this.processQueue();
  }

  /**
   * Run `fn` while holding a slot.
   */
  public async run<T>(holderId: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(holderId, signal);
    try {
      return await fn();
    } finally {
      this.release(holderId);
    }
  }

  public getStats(): ConcurrencyGateStats {
    return {
      limit: this.limit,
      active: this.active.size,
      queued: this.queue.length,
      peakActive: this.peakActive,
      totalAdmitted: this.totalAdmitted,
      totalReleased: this.totalReleased,
      totalAborted: this.totalAborted,
    };
  }

  private admit(holderId: string): void {
    this.active.add(holderId);
    this.totalAdmitted++;
    this.peakActive = Math.max(this.peakActive, this.active.size);

    try {
      this.emit('admitted', holderId, this.active.size);
    } catch (err) {
      this.logger?.error({ err, holderId }, 'Error emitting admitted event');
    }
  }

  private processQueue(): void {
    while (this.active.size < this.limit) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }

      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }

      this.admit(next.holderId);
      this.logger?.debug(
        { holderId: next.holderId, queueWaitMs: Date.now() - next.enqueuedAt, remainingQueue: this.queue.length },
        'Queued holder admitted'
      );
      next.resolve();
    }
  }
}
