import pino, { DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadLoggingConfig, type LoggingConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorLogger(level: string): { logger: pino.Logger; logs: string[] } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink: DestinationStream = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logger: pino({ level }, sink), logs };
}

function createLogger(cfg: LoggingConfig): pino.Logger {
  if (process.env.TEST_LOG_COLLECTOR === '1') {
    return collectorLogger(cfg.level).logger;
  }
  return pino({
    level: cfg.level,
    transport: cfg.json ? undefined : { target: 'pino-pretty' },
  });
}

/** Rebuilds the process logger from an explicitly loaded config. */
export function configureLogger(cfg: LoggingConfig): pino.Logger {
  loggerInstance = createLogger(cfg);
  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger(loadLoggingConfig());
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection, returns the captured JSON lines
export function __enableTestLogCollector(level = 'info') {
  const { logger, logs } = collectorLogger(level);
  loggerInstance = logger;
  return logs;
}
