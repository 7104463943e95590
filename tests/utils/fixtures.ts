import type { ExceptionFinding, ShipmentSnapshot } from '../../src/core/types.js';
import type { RuleContext } from '../../src/rules/evaluators.js';
import { DEFAULT_THRESHOLDS } from '../../src/rules/thresholds.js';

export const NOW = new Date('2026-03-10T12:00:00Z');

const HOUR_MS = 3_600_000;

export function hoursAfter(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() + hours * HOUR_MS);
}

export function hoursBefore(hours: number, from: Date = NOW): Date {
  return hoursAfter(-hours, from);
}

/** A quiet shipment: on time, low model confidence, recent milestone. */
export function makeSnapshot(overrides: Partial<ShipmentSnapshot> = {}): ShipmentSnapshot {
  return {
    shipmentId: 'S1',
    scheduledEta: NOW,
    currentEtaEstimate: NOW,
    mlDelayConfidence: 0.4,
    mlRiskFactors: [],
    lastMilestoneAt: hoursBefore(10),
    expectedMilestoneIntervalHours: 24,
    ...overrides,
  };
}

export function delayedBy(hours: number, overrides: Partial<ShipmentSnapshot> = {}): ShipmentSnapshot {
  return makeSnapshot({ scheduledEta: NOW, currentEtaEstimate: hoursAfter(hours), ...overrides });
}

export const ctx: RuleContext = { now: NOW, thresholds: DEFAULT_THRESHOLDS };

export function delayFinding(
  shipmentId: string,
  severity: ExceptionFinding['severity'],
  summary = `delay on ${shipmentId}`,
): ExceptionFinding {
  return {
    shipmentId,
    type: 'delay',
    severity,
    summary,
    details: { delayHours: 30, thresholdHours: 24 },
  };
}
