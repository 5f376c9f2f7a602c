/**
 * Pooled session bookkeeping.
 *
 * A PooledSession owns exactly one backend handle for its whole life. The
 * pool mutates it only inside its mutex; callers see it through a
 * SessionLease, which is the temporary right to use the handle.
 */

import type { BackendHandle, BackendOptions } from '../types/backend.js';

/**
 * Per-session diagnostic snapshot.
 */
export interface SessionInfo {
  id: string;
  ephemeral: boolean;
  active: boolean;
  retiring: boolean;
  useCount: number;
  ageMs: number;
  idleMs: number;
  ttlDeadline: number;
}

/**
 * Stable key for creation options; idle ephemeral sessions are only reused
 * for requests built with the same options.
 */
export function backendOptionsKey(options: BackendOptions): string {
  return JSON.stringify([
    options.model,
    options.systemPrompt ?? null,
    options.allowedTools ? [...options.allowedTools].sort() : null,
    options.maxTurns ?? null,
    options.maxThinkingTokens ?? null,
  ]);
}

export class PooledSession {
  public readonly id: string;
  public readonly handle: BackendHandle;
  public readonly options: BackendOptions;
  public readonly optionsKey: string;
  public readonly ephemeral: boolean;
  public readonly createdAt: number;
  public lastUsedAt: number;
  public isActive = false;
  public useCount = 0;
  /** Close on release instead of returning to the pool */
  public retiring = false;

  private readonly ttlMs: number;

  constructor(params: {
    id: string;
    handle: BackendHandle;
    options: BackendOptions;
    ephemeral: boolean;
    ttlMs: number;
    now: number;
  }) {
    this.id = params.id;
    this.handle = params.handle;
    this.options = params.options;
    this.optionsKey = backendOptionsKey(params.options);
    this.ephemeral = params.ephemeral;
    this.ttlMs = params.ttlMs;
    this.createdAt = params.now;
    this.lastUsedAt = params.now;
  }

  /**
   * Idle deadline; refreshed whenever the session is acquired or released.
   */
  public get ttlDeadline(): number {
    return this.lastUsedAt + this.ttlMs;
  }

  public isExpired(now: number): boolean {
    return now > this.ttlDeadline;
  }

  public markAcquired(now: number): void {
    this.isActive = true;
    this.lastUsedAt = now;
    this.useCount += 1;
  }

  public markReleased(now: number): void {
    this.isActive = false;
    this.lastUsedAt = now;
  }

  public info(now: number): SessionInfo {
    return {
      id: this.id,
      ephemeral: this.ephemeral,
      active: this.isActive,
      retiring: this.retiring,
      useCount: this.useCount,
      ageMs: now - this.createdAt,
      idleMs: this.isActive ? 0 : now - this.lastUsedAt,
      ttlDeadline: this.ttlDeadline,
    };
  }
}

/**
 * Exclusive, temporary right to use a pooled session's handle.
 *
 * Release goes through `SessionPool.release`; a lease can be released once.
 */
export class SessionLease {
  public readonly session: PooledSession;
  public readonly acquiredAt: number;
  private released = false;

  constructor(session: PooledSession, acquiredAt: number) {
    this.session = session;
    this.acquiredAt = acquiredAt;
  }

  public get sessionId(): string {
    return this.session.id;
  }

  public get handle(): BackendHandle {
    return this.session.handle;
  }

  public get ephemeral(): boolean {
    return this.session.ephemeral;
  }

  public isReleased(): boolean {
    return this.released;
  }

  /**
   * Flip the lease to released. Returns false if it already was.
   */
  public markReleased(): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    return true;
  }
}
