export { AgentGateway, type AgentGatewayOptions, type GatewayStats } from './services/gateway.js';
export {
  MessageService,
  type MessageServiceConfig,
  type MessageServiceOptions,
  type MessageCallOptions,
} from './services/message-service.js';

export {
  SessionPool,
  type SessionPoolConfig,
  type SessionPoolOptions,
  type SessionPoolEvents,
  type SessionPoolStats,
  type AcquireOptions,
  type EvictionReason,
} from './core/session-pool.js';
export { PooledSession, SessionLease, type SessionInfo } from './core/pooled-session.js';
export {
  BatchEngine,
  toMessageBatch,
  formatResultLine,
  generateBatchId,
  isTerminalStatus,
  type BatchEngineConfig,
  type BatchEngineOptions,
  type BatchEngineEvents,
  type BatchEngineStats,
  type BatchExecutor,
  type EntryExecution,
  type ResultsOptions,
  type SweepResult,
  type PurgeReason,
} from './core/batch-engine.js';
export { ConcurrencyGate, type ConcurrencyGateStats } from './core/concurrency-gate.js';
export {
  RequestContext,
  createRequestContext,
  generateRequestId,
  runWithContext,
  getContext,
  type RequestContextInit,
} from './core/request-context.js';

export { bridgeStream, type StreamBridgeOptions } from './streaming/stream-bridge.js';
export {
  StreamTranslator,
  translateEvents,
  collectResponse,
  finalResultToResponse,
  estimateTokens,
  generateMessageId,
  type TranslationOptions,
} from './streaming/event-translator.js';
export {
  applyMessageMode,
  parseMessageMode,
  isMessageMode,
  formatToolUseAsXml,
  formatToolResultAsXml,
} from './streaming/message-mode.js';
export { encodeSseEvent, encodeSseError, formatSseChunk, formatSseComment, type SseChunk } from './streaming/sse.js';

export { NoopLogSink, PinoLogSink, recordSafely, type LogSink } from './telemetry/log-sink.js';

export {
  GatewayError,
  toGatewayError,
  createCanceledError,
  createTimeoutError,
  describeError,
  zodErrorToGatewayError,
  type GatewayErrorCode,
  type GatewayErrorShape,
  type AnthropicErrorBody,
} from './api/errors.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getSessionPoolConfig,
  getBatchEngineConfig,
  getMessageServiceConfig,
  type Config,
  type ConfigEnvironment,
} from './config/loader.js';
export { createLogger, componentLogger, type LoggerOptions } from './utils/logger.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
