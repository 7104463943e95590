import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { DEFAULT_THRESHOLDS } from '../rules/thresholds.js';

dotenv.config();

const ThresholdsSchema = z.object({
  delayHours: z.number().positive().default(DEFAULT_THRESHOLDS.delayHours),
  mlConfidence: z.number().min(0).max(1).default(DEFAULT_THRESHOLDS.mlConfidence),
  temperatureDeviationCelsius: z
    .number()
    .positive()
    .default(DEFAULT_THRESHOLDS.temperatureDeviationCelsius),
  missingMilestoneHours: z.number().positive().default(DEFAULT_THRESHOLDS.missingMilestoneHours),
});

export const CYCLE_DEADLINE_RATIO = 0.8;

export function defaultCycleDeadlineMs(intervalMs: number): number {
  return Math.max(1, Math.floor(intervalMs * CYCLE_DEADLINE_RATIO));
}

const ConfigSchema = z.object({
  database: z.object({
    provider: z.enum(['mongodb', 'memory']).default('mongodb'),
    url: z.string().min(1),
  }),
  handler: z.object({
    baseUrl: z.string().url(),
    skill: z.string().min(1).default('handle-exception'),
    timeoutMs: z.number().int().positive().default(30_000),
    retryDelayMs: z.number().int().nonnegative().default(250),
    signingSecret: z.string().min(1).optional(),
  }),
  monitor: z
    .object({
      enabled: z.boolean().default(true),
      intervalMs: z.number().int().positive().default(300_000),
      // Derived from the interval when unset
      cycleDeadlineMs: z.number().int().positive().optional(),
      shutdownTimeoutMs: z.number().int().positive().default(30_000),
      runOnStart: z.boolean().default(true),
      thresholds: ThresholdsSchema,
    })
    .transform((m) => ({
      ...m,
      cycleDeadlineMs: m.cycleDeadlineMs ?? defaultCycleDeadlineMs(m.intervalMs),
    }))
    .refine((m) => m.cycleDeadlineMs < m.intervalMs, {
      message: 'monitor.cycleDeadlineMs must be less than monitor.intervalMs',
      path: ['cycleDeadlineMs'],
    }),
  snapshots: z.object({
    path: z.string().min(1),
  }),
  classifier: z.object({
    mode: z.enum(['snapshot', 'http']).default('snapshot'),
    url: z.string().url(),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  notifications: z.object({
    defaultLanguage: z.string().min(2).default('en'),
    trackingBaseUrl: z.string().url().default('https://track.example.com'),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
  server: z.object({
    port: z.number().int().positive().default(3000),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type FileConfig = Partial<Record<keyof AppConfig, Record<string, unknown>>>;

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

// Drops undefined env values so zod defaults apply
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function loadConfig(configPath = 'monitor.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: FileConfig = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const fileMonitor = fileRaw.monitor || {};
  const fileThresholds =
    typeof fileMonitor.thresholds === 'object' && fileMonitor.thresholds !== null
      ? fileMonitor.thresholds
      : {};
  const merged = {
    database: {
      provider: process.env.DATABASE_PROVIDER || 'mongodb',
      url: process.env.DATABASE_URL || 'mongodb://127.0.0.1:27017/shipment-monitor',
      ...(fileRaw.database || {}),
    },
    handler: {
      baseUrl: process.env.EXCEPTION_HANDLER_URL || 'http://localhost:9000',
      ...defined({
        timeoutMs: envNumber('EXCEPTION_HANDLER_TIMEOUT_MS'),
        signingSecret: process.env.EXCEPTION_HANDLER_SIGNING_SECRET || undefined,
      }),
      ...(fileRaw.handler || {}),
    },
    monitor: {
      ...defined({
        enabled: envBool('MONITOR_ENABLED'),
        intervalMs: envNumber('MONITOR_INTERVAL_MS'),
        cycleDeadlineMs: envNumber('MONITOR_CYCLE_DEADLINE_MS'),
        shutdownTimeoutMs: envNumber('MONITOR_SHUTDOWN_TIMEOUT_MS'),
      }),
      ...fileMonitor,
      thresholds: {
        ...defined({
          delayHours: envNumber('DELAY_THRESHOLD_HOURS'),
          mlConfidence: envNumber('ML_CONFIDENCE_THRESHOLD'),
          temperatureDeviationCelsius: envNumber('TEMP_DEVIATION_THRESHOLD_C'),
          missingMilestoneHours: envNumber('MILESTONE_THRESHOLD_HOURS'),
        }),
        ...fileThresholds,
      },
    },
    snapshots: {
      path: process.env.SHIPMENT_SNAPSHOT_PATH || './data/shipments.json',
      ...(fileRaw.snapshots || {}),
    },
    classifier: {
      url: process.env.CLASSIFIER_URL || 'http://localhost:8000',
      ...defined({ mode: process.env.CLASSIFIER_MODE || undefined }),
      ...(fileRaw.classifier || {}),
    },
    notifications: {
      ...defined({ defaultLanguage: process.env.NOTIFICATION_LANGUAGE || undefined }),
      ...(fileRaw.notifications || {}),
    },
    logging: { level: process.env.LOG_LEVEL || 'info', json: true, ...(fileRaw.logging || {}) },
    server: { ...defined({ port: envNumber('PORT') }), ...(fileRaw.server || {}) },
  };
  return ConfigSchema.parse(merged);
}
