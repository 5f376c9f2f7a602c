/**
 * Log sinks
 *
 * Completion records (requests, streams, batch entries, batches) are handed
 * to a LogSink. Storage backends plug in behind this interface; the gateway
 * ships a no-op sink and one that writes through pino.
 */

import type { Logger } from 'pino';
import type { LogRecord } from '../types/log-records.js';

export interface LogSink {
  record(record: LogRecord): void;
}

export class NoopLogSink implements LogSink {
  public record(_record: LogRecord): void {
    // discard
  }
}

/**
 * Writes each record as one structured pino line, message = event name.
 */
export class PinoLogSink implements LogSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'LogSink' });
  }

  public record(record: LogRecord): void {
    if (isFailure(record)) {
      this.logger.warn(record, record.event);
    } else {
      this.logger.info(record, record.event);
    }
  }
}

function isFailure(record: LogRecord): boolean {
  switch (record.event) {
    case 'request_completed':
      return record.outcome === 'error';
    case 'stream_completed':
      return record.cause === 'error';
    case 'batch_entry_completed':
      return record.result === 'errored';
    case 'batch_completed':
      return false;
  }
}

/**
 * Hand a record to the sink; a throwing sink is logged, never propagated.
 */
export function recordSafely(sink: LogSink, record: LogRecord, logger?: Logger): void {
  try {
    sink.record(record);
  } catch (err) {
    logger?.error({ err, event: record.event }, 'Log sink failed to record');
  }
}
