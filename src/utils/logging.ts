import pino, { DestinationStream } from 'pino';
import { Writable } from 'stream';
import { logLevelSchema, type LoggingConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorSink(): { logs: string[]; sink: DestinationStream } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink: sink as unknown as DestinationStream };
}

function build(cfg: LoggingConfig): pino.Logger {
  if (process.env.TEST_LOG_COLLECTOR === '1') {
    return pino({ level: cfg.level }, collectorSink().sink);
  }
  return pino({
    name: 'mediahub-workflow',
    level: cfg.level,
    transport: cfg.json ? undefined : { target: 'pino-pretty' },
  });
}

// Used until initLogger runs; reads only the environment, never a config file
function envLogging(): LoggingConfig {
  const level = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return { level: level.success ? level.data : 'info', json: process.env.LOG_PRETTY !== '1' };
}

/** Replaces the shared logger with one built from resolved configuration. */
export function initLogger(cfg: LoggingConfig): pino.Logger {
  loggerInstance = build(cfg);
  return loggerInstance;
}

export function getLogger() {
  if (!loggerInstance) loggerInstance = build(envLogging());
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level = 'debug') {
  const { logs, sink } = collectorSink();
  loggerInstance = pino({ level }, sink);
  return logs;
}
