import { randomUUID } from 'crypto';
import { SnapshotUnavailableError } from '../core/errors.js';
import type { ExceptionFinding, MonitorRunRecord, ShipmentSnapshot } from '../core/types.js';
import {
  findingsTotal,
  lastRunTimestampSeconds,
  monitorRunsTotal,
  ruleErrorsTotal,
  runDurationSeconds,
} from '../metrics/index.js';
import type { RuleThresholds } from '../rules/thresholds.js';
import { getComponentLogger } from '../utils/logging.js';
import { ExceptionAggregator } from './aggregator.js';
import type { DispatchOutcome, NotificationDispatcher } from './dispatcher.js';
import type { RunRecorder } from './runRecorder.js';
import type { SnapshotProvider } from './snapshotProvider.js';

export interface MonitorServiceDeps {
  provider: SnapshotProvider;
  dispatcher: NotificationDispatcher;
  recorder: RunRecorder;
  thresholds: Readonly<RuleThresholds>;
  cycleDeadlineMs: number;
  aggregator?: ExceptionAggregator;
  clock?: () => Date;
}

export interface MonitorRunResult {
  runId: string;
  record: MonitorRunRecord;
  /** Id of the stored history row; null when the write failed. */
  recordId: string | null;
  findings: ExceptionFinding[];
  outcomes: DispatchOutcome[];
  ruleErrors: number;
  deadlineExceeded: boolean;
}

export interface RunOptions {
  cancel?: AbortSignal;
}

/** One monitor cycle: snapshot, evaluate, dispatch, record. */
export class MonitorService {
  private readonly aggregator: ExceptionAggregator;
  private readonly clock: () => Date;

  constructor(private readonly deps: MonitorServiceDeps) {
    this.aggregator = deps.aggregator ?? new ExceptionAggregator();
    this.clock = deps.clock ?? (() => new Date());
  }

  async runOnce(opts: RunOptions = {}): Promise<MonitorRunResult> {
    const log = getComponentLogger('monitor');
    const runId = randomUUID();
    const started = process.hrtime.bigint();
    const now = this.clock();
    lastRunTimestampSeconds.set(now.getTime() / 1000);
    log.info({ runId, runTimestamp: now.toISOString() }, 'monitor-run-started');

    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => deadline.abort(), this.deps.cycleDeadlineMs);
    try {
      let snapshots: readonly ShipmentSnapshot[];
      try {
        snapshots = await this.deps.provider.listActiveShipments(now);
      } catch (err) {
        const e =
          err instanceof SnapshotUnavailableError
            ? err
            : new SnapshotUnavailableError('Snapshot provider failed', err);
        log.error({ runId, err: e }, 'snapshot-unavailable');
        return await this.finish(runId, started, log, {
          record: {
            runTimestamp: now,
            shipmentsChecked: 0,
            exceptionsFound: 0,
            notificationsSent: 0,
            runDurationMs: 0,
            error: 'SnapshotUnavailable',
          },
          findings: [],
          outcomes: [],
          ruleErrors: 0,
          deadlineExceeded: false,
        });
      }

      const { findings, ruleErrors } = this.aggregator.aggregate(snapshots, {
        now,
        thresholds: this.deps.thresholds,
      });
      for (const f of findings) findingsTotal.inc({ type: f.type, severity: f.severity });
      for (const e of ruleErrors) ruleErrorsTotal.inc({ rule: e.rule });

      const languages = new Map(snapshots.map((s) => [s.shipmentId, s.language]));
      const dispatch = await this.deps.dispatcher.dispatchAll(
        findings,
        { deadline: deadline.signal, cancel: opts.cancel },
        (id) => languages.get(id),
      );
      if (deadline.signal.aborted) {
        log.warn({ runId, cycleDeadlineMs: this.deps.cycleDeadlineMs }, 'monitor-run-deadline-exceeded');
      }

      return await this.finish(runId, started, log, {
        record: {
          runTimestamp: now,
          shipmentsChecked: snapshots.length,
          exceptionsFound: findings.length,
          notificationsSent: dispatch.sent,
          runDurationMs: 0,
        },
        findings,
        outcomes: dispatch.outcomes,
        ruleErrors: ruleErrors.length,
        deadlineExceeded: deadline.signal.aborted,
      });
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  private async finish(
    runId: string,
    started: bigint,
    log: ReturnType<typeof getComponentLogger>,
    partial: Omit<MonitorRunResult, 'runId' | 'recordId'>,
  ): Promise<MonitorRunResult> {
    const seconds = Number(process.hrtime.bigint() - started) / 1e9;
    const record: MonitorRunRecord = { ...partial.record, runDurationMs: Math.round(seconds * 1000) };
    const stored = await this.deps.recorder.record(record);
    runDurationSeconds.observe(seconds);
    monitorRunsTotal.inc({ outcome: record.error ? 'snapshot_unavailable' : 'ok' });
    log.info(
      {
        runId,
        shipmentsChecked: record.shipmentsChecked,
        exceptionsFound: record.exceptionsFound,
        notificationsSent: record.notificationsSent,
        runDurationMs: record.runDurationMs,
        ruleErrors: partial.ruleErrors,
        error: record.error,
      },
      'monitor-run-completed',
    );
    return { ...partial, runId, record, recordId: stored?.id ?? null };
  }
}
