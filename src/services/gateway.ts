/**
 * Agent Gateway
 *
 * Composition root: owns the session pool, the message service and the
 * batch engine, and gives them one explicit lifecycle. Nothing here is a
 * module-level singleton; embed as many gateways as needed.
 *
 * @example
 * ```typescript
 * const gateway = new AgentGateway({ factory, logger: createLogger() });
 * gateway.start();
 * const reply = await gateway.messages.createMessage({
 *   model: 'claude-sonnet-4-5',
 *   max_tokens: 512,
 *   messages: [{ role: 'user', content: 'Hello' }],
 * });
 * await gateway.stop();
 * ```
 */

import type { Logger } from 'pino';
import {
  getBatchEngineConfig,
  getConfig,
  getMessageServiceConfig,
  getSessionPoolConfig,
  type Config,
} from '../config/loader.js';
import { BatchEngine, type BatchEngineStats } from '../core/batch-engine.js';
import { SessionPool, type SessionPoolStats } from '../core/session-pool.js';
import { NoopLogSink, PinoLogSink, type LogSink } from '../telemetry/log-sink.js';
import type { BackendFactory } from '../types/backend.js';
import { componentLogger } from '../utils/logger.js';
import { MessageService } from './message-service.js';

export interface AgentGatewayOptions {
  factory: BackendFactory;
  /** Validated configuration; the global config is loaded when absent */
  config?: Config;
  logger?: Logger;
  /** Completion record sink; pino-backed when a logger is given */
  sink?: LogSink;
}

export interface GatewayStats {
  running: boolean;
  pool: SessionPoolStats;
  batches: BatchEngineStats;
}

export class AgentGateway {
  public readonly pool: SessionPool;
  public readonly messages: MessageService;
  public readonly batches: BatchEngine;

  private readonly logger?: Logger;
  private running = false;

  constructor(options: AgentGatewayOptions) {
    const config = options.config ?? getConfig();
    this.logger = options.logger;
    const sink = options.sink ?? (options.logger ? new PinoLogSink(options.logger) : new NoopLogSink());
    const messageConfig = getMessageServiceConfig(config);

    this.pool = new SessionPool({
      ...getSessionPoolConfig(config),
      factory: options.factory,
      defaultBackendOptions: {
        model: messageConfig.defaultModel,
        maxTurns: messageConfig.maxTurns,
      },
      logger: componentLogger(options.logger, 'SessionPool'),
    });

    this.messages = new MessageService({
      ...messageConfig,
      pool: this.pool,
      sink,
      logger: componentLogger(options.logger, 'MessageService'),
    });

    this.batches = new BatchEngine({
      ...getBatchEngineConfig(config),
      executor: (params, execution) =>
        this.messages.createMessage(params, { signal: execution.signal, context: execution.context }),
      sink,
      logger: componentLogger(options.logger, 'BatchEngine'),
    });
  }

  /**
   * Start the session reaper and the batch retention sweep. Idempotent.
   */
  public start(): void {
    if (this.running) {
      return;
    }
    this.pool.start();
    this.batches.start();
    this.running = true;
    this.logger?.info('Agent gateway started');
  }

  /**
   * Cancel unfinished batches, wait for their entries, then close the pool.
   */
  public async stop(): Promise<void> {
    await this.batches.stop();
    await this.pool.stop();
    this.running = false;
    this.logger?.info('Agent gateway stopped');
  }

  public isRunning(): boolean {
    return this.running;
  }

  public stats(): GatewayStats {
    return {
      running: this.running,
      pool: this.pool.stats(),
      batches: this.batches.stats(),
    };
  }
}
