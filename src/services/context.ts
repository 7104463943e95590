import type { AppConfig } from '../config/index.js';
import { closeDatabase, connectDatabase } from '../db/client.js';
import { MongoRunHistoryRepository } from '../repositories/mongoRunHistoryRepository.js';
import {
  InMemoryRunHistoryRepository,
  type RunHistoryRepository,
} from '../repositories/runHistoryRepository.js';
import { HttpDelayClassifier, SnapshotSignalClassifier, type DelayClassifier } from './classifier.js';
import { DelayWarningService } from './delayWarning.js';
import { NotificationDispatcher } from './dispatcher.js';
import { MonitorService } from './monitorService.js';
import { LoggingNotificationTransport, type NotificationTransport } from './notificationTransport.js';
import { RunRecorder } from './runRecorder.js';
import { MonitorScheduler, type MonitorRunner } from './scheduler.js';
import { JsonFileSnapshotProvider, type SnapshotProvider } from './snapshotProvider.js';

export interface MonitorContext {
  config: AppConfig;
  history: RunHistoryRepository;
  provider: SnapshotProvider;
  monitor: MonitorService;
  scheduler: MonitorScheduler;
  delayWarning: DelayWarningService;
  close(): Promise<void>;
}

export interface ContextOverrides {
  history?: RunHistoryRepository;
  provider?: SnapshotProvider;
  classifier?: DelayClassifier;
  transport?: NotificationTransport;
  /** Replaces the cycle the scheduler drives; the real MonitorService is still built. */
  runner?: MonitorRunner;
  clock?: () => Date;
}

/** Wires the process-wide services from configuration. */
export async function createMonitorContext(
  config: AppConfig,
  overrides: ContextOverrides = {},
): Promise<MonitorContext> {
  let usesMongo = false;
  let history = overrides.history;
  if (!history) {
    if (config.database.provider === 'mongodb') {
      await connectDatabase(config.database.url);
      usesMongo = true;
      history = new MongoRunHistoryRepository();
    } else {
      history = new InMemoryRunHistoryRepository();
    }
  }

  const provider = overrides.provider ?? new JsonFileSnapshotProvider(config.snapshots.path);
  const thresholds = config.monitor.thresholds;
  const dispatcher = new NotificationDispatcher({
    baseUrl: config.handler.baseUrl,
    skill: config.handler.skill,
    timeoutMs: config.handler.timeoutMs,
    retryDelayMs: config.handler.retryDelayMs,
    signingSecret: config.handler.signingSecret,
    defaultLanguage: config.notifications.defaultLanguage,
    trackingBaseUrl: config.notifications.trackingBaseUrl,
  });
  const monitor = new MonitorService({
    provider,
    dispatcher,
    recorder: new RunRecorder(history),
    thresholds,
    cycleDeadlineMs: config.monitor.cycleDeadlineMs,
    clock: overrides.clock,
  });
  const scheduler = new MonitorScheduler(overrides.runner ?? monitor, {
    intervalMs: config.monitor.intervalMs,
    shutdownTimeoutMs: config.monitor.shutdownTimeoutMs,
    runOnStart: config.monitor.runOnStart,
    cycleDeadlineMs: config.monitor.cycleDeadlineMs,
  });

  const classifier =
    overrides.classifier ??
    (config.classifier.mode === 'http'
      ? new HttpDelayClassifier(config.classifier.url, config.classifier.timeoutMs)
      : new SnapshotSignalClassifier(provider, thresholds, overrides.clock));
  const delayWarning = new DelayWarningService(
    classifier,
    overrides.transport ?? new LoggingNotificationTransport(),
    thresholds,
    {
      defaultLanguage: config.notifications.defaultLanguage,
      trackingBaseUrl: config.notifications.trackingBaseUrl,
    },
  );

  return {
    config,
    history,
    provider,
    monitor,
    scheduler,
    delayWarning,
    async close() {
      await scheduler.stop();
      if (usesMongo) await closeDatabase();
    },
  };
}
