import pino from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

const base = { service: 'shipment-monitor' };

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    loggerInstance = pino({
      level: cfg.logging.level,
      base,
      transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
    });
  }
  return loggerInstance;
}

// Resolved at call time so a collector installed by a test is picked up
export function getComponentLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level: pino.LevelWithSilent = 'info'): string[] {
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  loggerInstance = pino({ level, base }, sink);
  return logs;
}
