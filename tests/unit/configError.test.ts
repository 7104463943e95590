import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';

afterEach(() => {
  delete process.env.MONITOR_INTERVAL_MS;
  delete process.env.MONITOR_CYCLE_DEADLINE_MS;
  delete process.env.ML_CONFIDENCE_THRESHOLD;
});

describe('config error handling', () => {
  it('throws on invalid JSON', () => {
    const tmp = path.join(process.cwd(), 'bad-config.json');
    fs.writeFileSync(tmp, '{ invalid');
    try {
      expect(() => loadConfig('bad-config.json')).toThrow(/Failed to parse config file/);
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('rejects an explicit cycle deadline that is not below the interval', () => {
    process.env.MONITOR_INTERVAL_MS = '60000';
    process.env.MONITOR_CYCLE_DEADLINE_MS = '60000';
    expect(() => loadConfig('nonexistent-config.json')).toThrow(/cycleDeadlineMs/);
  });

  it('rejects a confidence threshold outside [0, 1]', () => {
    process.env.ML_CONFIDENCE_THRESHOLD = '1.5';
    expect(() => loadConfig('nonexistent-config.json')).toThrow();
  });
});
