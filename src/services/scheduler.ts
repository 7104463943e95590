import { monitorTicksSkippedTotal } from '../metrics/index.js';
import { getComponentLogger } from '../utils/logging.js';
import type { MonitorRunResult, RunOptions } from './monitorService.js';

export type SchedulerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface MonitorRunner {
  runOnce(opts?: RunOptions): Promise<MonitorRunResult>;
}

export interface SchedulerOptions {
  intervalMs: number;
  shutdownTimeoutMs: number;
  runOnStart?: boolean;
  /** Cycle deadline the interval must stay above. */
  cycleDeadlineMs?: number;
}

export type TriggerResult =
  | { accepted: true; run: Promise<MonitorRunResult | null> }
  | { accepted: false; reason: 'in_flight' | 'stopped' };

/**
 * Owns the repeating timer. At most one cycle runs at a time: a tick that
 * lands during a cycle is dropped, and a manual trigger is refused.
 * `stopped` is terminal.
 */
export class MonitorScheduler {
  private state: SchedulerState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<MonitorRunResult | null> | null = null;
  private readonly cancel = new AbortController();
  private intervalMs: number;
  private lastRun: MonitorRunResult | null = null;
  private lastRunFinishedAt: Date | null = null;
  private totalRuns = 0;
  private skippedTicks = 0;

  constructor(
    private readonly runner: MonitorRunner,
    private readonly opts: SchedulerOptions,
  ) {
    this.intervalMs = opts.intervalMs;
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  start(intervalMs?: number) {
    if (this.state === 'stopping' || this.state === 'stopped') {
      throw new Error('Scheduler has been stopped');
    }
    if (this.timer) return;
    if (intervalMs !== undefined) {
      const deadline = this.opts.cycleDeadlineMs;
      if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
        throw new Error(`Invalid interval: ${intervalMs}`);
      }
      if (deadline !== undefined && intervalMs <= deadline) {
        throw new Error(`Interval ${intervalMs}ms must exceed the cycle deadline of ${deadline}ms`);
      }
      this.intervalMs = intervalMs;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    getComponentLogger('scheduler').info({ intervalMs: this.intervalMs }, 'monitor-scheduler-started');
    if (this.opts.runOnStart ?? true) this.tick();
  }

  trigger(): TriggerResult {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return { accepted: false, reason: 'stopped' };
    }
    if (this.state === 'running') return { accepted: false, reason: 'in_flight' };
    return { accepted: true, run: this.launch('manual') };
  }

  async stop(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') return;
    const log = getComponentLogger('scheduler');
    this.state = 'stopping';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.cancel.abort();
    if (this.inFlight) {
      let timeout: NodeJS.Timeout | undefined;
      const drained = await Promise.race([
        this.inFlight.then(() => true),
        new Promise<boolean>((resolve) => {
          timeout = setTimeout(() => resolve(false), this.opts.shutdownTimeoutMs);
        }),
      ]);
      clearTimeout(timeout);
      if (!drained) {
        log.warn({ shutdownTimeoutMs: this.opts.shutdownTimeoutMs }, 'monitor-stop-timeout');
      }
    }
    this.state = 'stopped';
    log.info({ totalRuns: this.totalRuns }, 'monitor-scheduler-stopped');
  }

  info() {
    return {
      state: this.state,
      intervalMs: this.intervalMs,
      totalRuns: this.totalRuns,
      skippedTicks: this.skippedTicks,
      lastRunFinishedAt: this.lastRunFinishedAt?.toISOString() || null,
      lastRun: this.lastRun ? { runId: this.lastRun.runId, ...this.lastRun.record } : null,
    };
  }

  private tick() {
    if (this.state === 'running') {
      this.skippedTicks += 1;
      monitorTicksSkippedTotal.inc();
      getComponentLogger('scheduler').warn({ intervalMs: this.intervalMs }, 'monitor-tick-skipped');
      return;
    }
    if (this.state !== 'idle') return;
    void this.launch('timer');
  }

  // Check-and-set happens synchronously, before the first await
  private launch(source: 'timer' | 'manual'): Promise<MonitorRunResult | null> {
    this.state = 'running';
    const run = this.execute(source);
    this.inFlight = run;
    return run;
  }

  private async execute(source: 'timer' | 'manual'): Promise<MonitorRunResult | null> {
    try {
      const result = await this.runner.runOnce({ cancel: this.cancel.signal });
      this.lastRun = result;
      this.totalRuns += 1;
      return result;
    } catch (err) {
      getComponentLogger('scheduler').error({ err, source }, 'monitor-run-failed');
      return null;
    } finally {
      this.lastRunFinishedAt = new Date();
      this.inFlight = null;
      if (this.state === 'running') this.state = 'idle';
    }
  }
}
