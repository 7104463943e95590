import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const monitorRunsTotal = new Counter({
  name: 'monitor_runs_total',
  help: 'Completed monitor cycles',
  labelNames: ['outcome'] as const, // outcome=ok|snapshot_unavailable
  registers: [registry],
});

export const monitorTicksSkippedTotal = new Counter({
  name: 'monitor_ticks_skipped_total',
  help: 'Scheduler ticks dropped because a cycle was still running',
  registers: [registry],
});

export const findingsTotal = new Counter({
  name: 'monitor_findings_total',
  help: 'Exception findings after dedup',
  labelNames: ['type', 'severity'] as const,
  registers: [registry],
});

export const ruleErrorsTotal = new Counter({
  name: 'monitor_rule_errors_total',
  help: 'Rule evaluations that threw and were skipped',
  labelNames: ['rule'] as const,
  registers: [registry],
});

export const notificationsSentTotal = new Counter({
  name: 'monitor_notifications_sent_total',
  help: 'Findings successfully handed to the exception handler',
  labelNames: ['type'] as const,
  registers: [registry],
});

export const notificationFailuresTotal = new Counter({
  name: 'monitor_notification_failures_total',
  help: 'Findings whose dispatch ultimately failed',
  labelNames: ['reason'] as const, // rejected|transport|deadline|cancelled
  registers: [registry],
});

export const dispatchRetriesTotal = new Counter({
  name: 'monitor_dispatch_retries_total',
  help: 'Dispatch retries after a transient failure',
  registers: [registry],
});

export const runDurationSeconds = new Histogram({
  name: 'monitor_run_duration_seconds',
  help: 'Wall time of a monitor cycle (seconds)',
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60, 240],
  registers: [registry],
});

export const lastRunTimestampSeconds = new Gauge({
  name: 'monitor_last_run_timestamp_seconds',
  help: 'Unix timestamp (seconds) at which the last cycle started',
  registers: [registry],
});

export const runRecordFailuresTotal = new Counter({
  name: 'monitor_run_record_failures_total',
  help: 'Run history writes that failed and were dropped',
  registers: [registry],
});

export const delayWarningsTotal = new Counter({
  name: 'monitor_delay_warnings_total',
  help: 'Proactive delay-warning gate outcomes',
  labelNames: ['result'] as const, // sent|below_threshold|no_recipient|transport_rejected
  registers: [registry],
});
