/**
 * Session Pool
 *
 * Keeps a bounded set of long-lived backend handles and leases them to one
 * caller at a time.
 *
 * Architecture:
 * - One AsyncMutex guards the session map; backend create(), clear() and
 *   close() run outside it
 * - A new session first reserves its id and a capacity slot under the
 *   mutex, then creates the handle unlocked, bounded by the acquire deadline
 *   and signal. A handle that arrives after the caller gave up is closed
 * - Callers that cannot be served (busy id, full pool) wait for a release,
 *   bounded by acquireTimeoutMs and their AbortSignal
 * - At capacity the least-recently-used idle session is evicted first
 * - A background reaper evicts idle sessions past their TTL deadline
 * - Every handle is cleared on release and closed exactly once, at eviction
 *
 * Omitting the session id means "any fresh conversation": an idle,
 * unexpired ephemeral session built with the same options is reused, or a
 * new `pool_session_NNNNNN` one is created.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SESSION_POOL, BACKEND } from '../config/defaults.js';
import { GatewayError, toGatewayError, describeError } from '../api/errors.js';
import type { BackendFactory, BackendHandle, BackendOptions } from '../types/backend.js';
import { AsyncMutex } from '../utils/mutex.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { throwIfAborted, abortReason, linkSignal, raceAbort } from '../utils/abort.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { PooledSession, SessionLease, backendOptionsKey, type SessionInfo } from './pooled-session.js';

export interface SessionPoolConfig {
  maxSessions: number;
  ttlMs: number;
  cleanupIntervalMs: number;
  acquireTimeoutMs: number;
}

export interface SessionPoolOptions extends Partial<SessionPoolConfig> {
  factory: BackendFactory;
  /** Options for sessions acquired without explicit backend options */
  defaultBackendOptions?: BackendOptions;
  logger?: Logger;
}

export interface AcquireOptions {
  backendOptions?: BackendOptions;
  /** Fail with SessionNotFound instead of creating a missing named session */
  requireExisting?: boolean;
  signal?: AbortSignal;
  /** Overrides acquireTimeoutMs for this call */
  timeoutMs?: number;
  requestId?: string;
}

export type EvictionReason = 'expired' | 'capacity' | 'clear_failed' | 'closed' | 'shutdown';

export interface SessionPoolEvents {
  sessionCreated: (sessionId: string) => void;
  sessionAcquired: (sessionId: string, useCount: number) => void;
  sessionReleased: (sessionId: string) => void;
  sessionEvicted: (sessionId: string, reason: EvictionReason) => void;
}

export interface SessionPoolStats {
  total: number;
  active: number;
  idle: number;
  capacity: number;
  waiting: number;
  /** Slots reserved by handle creations in flight */
  creating: number;
  created: number;
  evicted: number;
  acquired: number;
}

type AcquireAttempt =
  | { kind: 'acquired'; session: PooledSession }
  | { kind: 'create'; reservation: Reservation }
  | { kind: 'wait'; reason: 'session_busy' | 'pool_full'; wakeup: Wakeup };

interface Reservation {
  id: string;
  options: BackendOptions;
  ephemeral: boolean;
}

interface Wakeup {
  promise: Promise<void>;
  cancel(): void;
}

interface Eviction {
  session: PooledSession;
  reason: EvictionReason;
}

export class SessionPool extends EventEmitter<SessionPoolEvents> {
  private readonly config: SessionPoolConfig;
  private readonly factory: BackendFactory;
  private readonly defaultBackendOptions: BackendOptions;
  private readonly logger?: Logger;

  private readonly sessions = new Map<string, PooledSession>();
  private readonly reserved = new Map<string, Reservation>();
  private readonly mutex = new AsyncMutex();
  private readonly reaper = new TimerGuard();
  private readonly waiters = new Set<() => void>();

  private sequence = 0;
  private stopped = false;

  // Statistics
  private totalCreated = 0;
  private totalEvicted = 0;
  private totalAcquired = 0;

  constructor(options: SessionPoolOptions) {
    super();
    this.factory = options.factory;
    this.logger = options.logger;
    this.defaultBackendOptions = options.defaultBackendOptions ?? {
      model: BACKEND.DEFAULT_MODEL,
      maxTurns: BACKEND.MAX_TURNS,
    };
    this.config = {
      maxSessions: options.maxSessions ?? SESSION_POOL.MAX_SESSIONS,
      ttlMs: options.ttlMs ?? SESSION_POOL.TTL_MS,
      cleanupIntervalMs: options.cleanupIntervalMs ?? SESSION_POOL.CLEANUP_INTERVAL_MS,
      acquireTimeoutMs: options.acquireTimeoutMs ?? SESSION_POOL.ACQUIRE_TIMEOUT_MS,
    };

    if (this.config.maxSessions < 1) {
      throw new GatewayError('InvalidParams', 'maxSessions must be at least 1', {
        maxSessions: this.config.maxSessions,
      });
    }
  }

  /**
   * Start the background reaper. Idempotent.
   */
  public start(): void {
    if (this.reaper.isActive()) {
      return;
    }
    this.stopped = false;
    this.reaper.setInterval(() => {
      this.reap().catch((err: unknown) => {
        this.logger?.error({ err }, 'Session reaper pass failed');
      });
    }, this.config.cleanupIntervalMs);

    this.logger?.info({ config: this.config }, 'Session pool started');
  }

  /**
   * Stop the reaper, close every idle session and retire active ones so they
   * are closed on release. Pending acquires fail with InvalidState.
   */
  public async stop(): Promise<void> {
    this.reaper.clear();
    this.stopped = true;

    const evictions = await this.mutex.runExclusive(() => {
      const idle: Eviction[] = [];
      for (const session of this.sessions.values()) {
        if (session.isActive) {
          session.retiring = true;
        } else {
          idle.push({ session, reason: 'shutdown' });
        }
      }
      for (const { session } of idle) {
        this.sessions.delete(session.id);
      }
      this.notifyWaiters();
      return idle;
    });

    await this.closeAll(evictions);
    this.logger?.info({ closed: evictions.length, retiring: this.sessions.size }, 'Session pool stopped');
  }

  /**
   * Lease a session.
   *
   * @param sessionId - Named conversation, or undefined for a fresh ephemeral one
   * @throws GatewayError PoolExhausted when nothing frees up in time,
   *   SessionNotFound with `requireExisting`, Canceled on abort,
   *   BackendTimeout when handle creation outlasts the deadline,
   *   BackendUnavailable when the factory fails
   */
  public async acquire(sessionId?: string, options: AcquireOptions = {}): Promise<SessionLease> {
    const timeoutMs = options.timeoutMs ?? this.config.acquireTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      throwIfAborted(options.signal, 'session acquire', options.requestId);

      const evictions: Eviction[] = [];
      let attempt: AcquireAttempt;
      try {
        attempt = await this.mutex.runExclusive(() =>
          this.tryAcquire(sessionId, options, evictions)
        );
      } finally {
        await this.closeAll(evictions);
      }

      if (attempt.kind === 'acquired') {
        return this.lease(attempt.session, false);
      }
      if (attempt.kind === 'create') {
        const session = await this.createReserved(attempt.reservation, deadline, options);
        return this.lease(session, true);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        attempt.wakeup.cancel();
        this.logger?.warn(
          { sessionId, reason: attempt.reason, timeoutMs, requestId: options.requestId },
          'Session acquire timed out'
        );
        throw new GatewayError(
          'PoolExhausted',
          attempt.reason === 'session_busy'
            ? `Session ${sessionId ?? ''} is busy; timed out after ${timeoutMs}ms`
            : `Session pool exhausted (${this.config.maxSessions} sessions); timed out after ${timeoutMs}ms`,
          { sessionId, reason: attempt.reason, timeoutMs }
        );
      }

      lazyLog(
        this.logger,
        'debug',
        () => ({ sessionId, reason: attempt.reason, remainingMs: remaining }),
        'Waiting for a session release'
      );
      await this.waitForWakeup(attempt.wakeup, remaining, options.signal, options.requestId);
    }
  }

  /**
   * Return a leased session: clear it, then make it available again.
   *
   * A second release of the same lease is a no-op. A session whose clear
   * fails, or that was retired while leased, is evicted and closed.
   */
  public async release(lease: SessionLease): Promise<void> {
    if (!lease.markReleased()) {
      this.logger?.warn({ sessionId: lease.sessionId }, 'Lease already released');
      return;
    }

    const session = lease.session;
    let clearError: unknown;
    try {
      await session.handle.clear();
    } catch (err) {
      clearError = err;
      this.logger?.warn(
        { sessionId: session.id, error: describeError(err) },
        'Session clear failed; evicting'
      );
    }

    const eviction = await this.mutex.runExclusive((): Eviction | undefined => {
      session.markReleased(Date.now());

      let evict: Eviction | undefined;
      if (clearError !== undefined) {
        evict = { session, reason: 'clear_failed' };
      } else if (session.retiring || this.stopped) {
        evict = { session, reason: this.stopped ? 'shutdown' : 'closed' };
      }

      if (evict && this.sessions.get(session.id) === session) {
        this.sessions.delete(session.id);
      }
      this.notifyWaiters();
      return evict;
    });

    this.safeEmit('sessionReleased', () => this.emit('sessionReleased', session.id));
    if (eviction) {
      await this.closeAll([eviction]);
    }
  }

  /**
   * Acquire, run `fn`, and release on every exit path.
   */
  public async withSession<T>(
    sessionId: string | undefined,
    fn: (lease: SessionLease) => Promise<T>,
    options: AcquireOptions = {}
  ): Promise<T> {
    const lease = await this.acquire(sessionId, options);
    try {
      return await fn(lease);
    } finally {
      await this.release(lease);
    }
  }

  /**
   * Explicitly end a named session. An active session is retired and
   * closed when its lease is released.
   */
  public async closeSession(sessionId: string): Promise<void> {
    const eviction = await this.mutex.runExclusive((): Eviction | undefined => {
      const session = this.sessions.get(sessionId);
      if (!session) {
        throw new GatewayError('SessionNotFound', `Session not found: ${sessionId}`, { sessionId });
      }
      if (session.isActive) {
        session.retiring = true;
        return undefined;
      }
      this.sessions.delete(sessionId);
      this.notifyWaiters();
      return { session, reason: 'closed' };
    });

    if (eviction) {
      await this.closeAll([eviction]);
    }
  }

  /**
   * One reaper pass: evict idle sessions past their TTL deadline.
   *
   * @returns number of sessions evicted
   */
  public async reap(): Promise<number> {
    const evictions = await this.mutex.runExclusive(() => {
      const now = Date.now();
      const expired: Eviction[] = [];
      for (const session of this.sessions.values()) {
        if (!session.isActive && session.isExpired(now)) {
          expired.push({ session, reason: 'expired' });
        }
      }
      for (const { session } of expired) {
        this.sessions.delete(session.id);
      }
      if (expired.length > 0) {
        this.notifyWaiters();
      }
      return expired;
    });

    if (evictions.length > 0) {
      this.logger?.info({ evicted: evictions.length }, 'Reaped expired sessions');
    }
    await this.closeAll(evictions);
    return evictions.length;
  }

  public has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  public stats(): SessionPoolStats {
    let active = 0;
    for (const session of this.sessions.values()) {
      if (session.isActive) {
        active++;
      }
    }
    return {
      total: this.sessions.size,
      active,
      idle: this.sessions.size - active,
      capacity: this.config.maxSessions,
      waiting: this.waiters.size,
      creating: this.reserved.size,
      created: this.totalCreated,
      evicted: this.totalEvicted,
      acquired: this.totalAcquired,
    };
  }

  /**
   * Per-session diagnostics
   */
  public describeSessions(): SessionInfo[] {
    const now = Date.now();
    return Array.from(this.sessions.values(), (session) => session.info(now));
  }

  public getConfig(): Readonly<SessionPoolConfig> {
    return this.config;
  }

  /**
   * Runs under the mutex. Evicted sessions are pushed onto `evictions` and
   * closed by the caller once the lock is released.
   */
  private tryAcquire(
    sessionId: string | undefined,
    options: AcquireOptions,
    evictions: Eviction[]
  ): AcquireAttempt {
    if (this.stopped) {
      throw new GatewayError('InvalidState', 'Session pool is stopped');
    }

    const now = Date.now();
    const backendOptions = options.backendOptions ?? this.defaultBackendOptions;

    if (sessionId !== undefined) {
      const existing = this.sessions.get(sessionId);
      if (existing) {
        if (existing.isActive) {
          return { kind: 'wait', reason: 'session_busy', wakeup: this.nextWakeup() };
        }
        if (!existing.isExpired(now) && !existing.retiring) {
          existing.markAcquired(now);
          return { kind: 'acquired', session: existing };
        }
        // Expired: recreate under the same id
        this.sessions.delete(sessionId);
        evictions.push({ session: existing, reason: 'expired' });
      } else if (this.reserved.has(sessionId)) {
        return { kind: 'wait', reason: 'session_busy', wakeup: this.nextWakeup() };
      } else if (options.requireExisting) {
        throw new GatewayError('SessionNotFound', `Session not found: ${sessionId}`, { sessionId });
      }
    } else {
      const reusable = this.findReusableEphemeral(backendOptionsKey(backendOptions), now);
      if (reusable) {
        reusable.markAcquired(now);
        return { kind: 'acquired', session: reusable };
      }
    }

    if (this.sessions.size + this.reserved.size >= this.config.maxSessions) {
      const victim = this.leastRecentlyUsedIdle();
      if (!victim) {
        return { kind: 'wait', reason: 'pool_full', wakeup: this.nextWakeup() };
      }
      this.sessions.delete(victim.id);
      evictions.push({ session: victim, reason: 'capacity' });
    }

    const reservation: Reservation = {
      id: sessionId ?? this.nextEphemeralId(),
      options: backendOptions,
      ephemeral: sessionId === undefined,
    };
    this.reserved.set(reservation.id, reservation);
    return { kind: 'create', reservation };
  }

  private lease(session: PooledSession, created: boolean): SessionLease {
    this.totalAcquired++;
    this.safeEmit('sessionAcquired', () => this.emit('sessionAcquired', session.id, session.useCount));
    lazyLog(
      this.logger,
      'debug',
      () => ({ sessionId: session.id, useCount: session.useCount, created, stats: this.stats() }),
      'Session acquired'
    );
    return new SessionLease(session, session.lastUsedAt);
  }

  /**
   * Create the handle for a reserved slot outside the mutex, then commit the
   * session or give the slot back.
   */
  private async createReserved(
    reservation: Reservation,
    deadline: number,
    options: AcquireOptions
  ): Promise<PooledSession> {
    const { id } = reservation;
    const call = linkSignal(options.signal, Math.max(deadline - Date.now(), 1), 'session create', options.requestId);
    const creation = Promise.resolve().then(() => this.factory.create(reservation.options));

    let handle: BackendHandle;
    try {
      handle = await raceAbort(creation, call.signal, 'session create', options.requestId);
    } catch (err) {
      await this.mutex.runExclusive(() => {
        this.reserved.delete(id);
        this.notifyWaiters();
      });

      if (call.signal.aborted) {
        this.logger?.warn({ sessionId: id, error: describeError(err) }, 'Session creation abandoned');
        void creation.then(
          (late) => this.closeHandle(id, late),
          (lateErr: unknown) => {
            lazyLog(this.logger, 'debug', () => ({ sessionId: id, error: describeError(lateErr) }), 'Abandoned session creation failed');
          }
        );
      } else {
        this.logger?.error({ sessionId: id, error: describeError(err) }, 'Backend handle creation failed');
      }
      throw toGatewayError(err, 'BackendUnavailable');
    } finally {
      call.dispose();
    }

    const ready = handle;
    const session = await this.mutex.runExclusive((): PooledSession | undefined => {
      this.reserved.delete(id);
      if (this.stopped) {
        this.notifyWaiters();
        return undefined;
      }
      const now = Date.now();
      const created = new PooledSession({
        id,
        handle: ready,
        options: reservation.options,
        ephemeral: reservation.ephemeral,
        ttlMs: this.config.ttlMs,
        now,
      });
      created.markAcquired(now);
      this.sessions.set(id, created);
      this.totalCreated++;
      return created;
    });

    if (!session) {
      await this.closeHandle(id, ready);
      throw new GatewayError('InvalidState', 'Session pool is stopped');
    }

    this.safeEmit('sessionCreated', () => this.emit('sessionCreated', id));
    this.logger?.debug({ sessionId: id, model: reservation.options.model }, 'Session created');
    return session;
  }

  /**
   * Close a handle that never became a pooled session.
   */
  private async closeHandle(sessionId: string, handle: BackendHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      this.logger?.warn({ sessionId, error: describeError(err) }, 'Session close failed');
    }
  }

  private nextEphemeralId(): string {
    let id: string;
    do {
      this.sequence++;
      id = `pool_session_${String(this.sequence).padStart(6, '0')}`;
    } while (this.sessions.has(id) || this.reserved.has(id));
    return id;
  }

  /**
   * Most recently used idle ephemeral session with matching options
   */
  private findReusableEphemeral(optionsKey: string, now: number): PooledSession | undefined {
    let best: PooledSession | undefined;
    for (const session of this.sessions.values()) {
      if (
        session.ephemeral &&
        !session.isActive &&
        !session.retiring &&
        session.optionsKey === optionsKey &&
        !session.isExpired(now) &&
        (!best || session.lastUsedAt > best.lastUsedAt)
      ) {
        best = session;
      }
    }
    return best;
  }

  private leastRecentlyUsedIdle(): PooledSession | undefined {
    let victim: PooledSession | undefined;
    for (const session of this.sessions.values()) {
      if (!session.isActive && (!victim || session.lastUsedAt < victim.lastUsedAt)) {
        victim = session;
      }
    }
    return victim;
  }

  /**
   * Promise resolved by the next release or eviction. Registered under the
   * mutex so a wakeup between the failed attempt and the wait is not lost.
   */
  private nextWakeup(): Wakeup {
    let resolveFn: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
      resolveFn = resolve;
    });
    this.waiters.add(resolveFn);
    return {
      promise,
      cancel: () => {
        this.waiters.delete(resolveFn);
      },
    };
  }

  private notifyWaiters(): void {
    const waiters = Array.from(this.waiters);
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Resolve on wakeup or when `timeoutMs` elapses; reject on abort.
   */
  private waitForWakeup(
    wakeup: Wakeup,
    timeoutMs: number,
    signal: AbortSignal | undefined,
    requestId: string | undefined
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        wakeup.cancel();
      };
      const onAbort = (): void => {
        cleanup();
        reject(abortReason(signal, 'session acquire', requestId));
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve();
      }, timeoutMs);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      wakeup.promise.then(
        () => {
          cleanup();
          resolve();
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        }
      );
    });
  }

  /**
   * Close evicted handles. Failures are logged; the session is gone either way.
   */
  private async closeAll(evictions: Eviction[]): Promise<void> {
    for (const { session, reason } of evictions) {
      try {
        await session.handle.close();
      } catch (err) {
        this.logger?.warn(
          { sessionId: session.id, reason, error: describeError(err) },
          'Session close failed'
        );
      }
      this.totalEvicted++;
      this.safeEmit('sessionEvicted', () => this.emit('sessionEvicted', session.id, reason));
      this.logger?.debug({ sessionId: session.id, reason }, 'Session evicted');
    }
  }

  private safeEmit(event: keyof SessionPoolEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err, event }, 'Error emitting session pool event');
    }
  }
}
