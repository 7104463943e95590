import type { ExceptionFinding, ExceptionType, ShipmentSnapshot } from '../core/types.js';
import { distanceOutsideCorridorKm } from '../utils/geo.js';
import { SEVERITY_CUTOFFS, type RuleThresholds } from './thresholds.js';

export interface RuleContext {
  /** Captured once per run; every rule compares against the same instant. */
  now: Date;
  thresholds: Readonly<RuleThresholds>;
}

export interface RuleEvaluator {
  name: string;
  type: ExceptionType;
  evaluate(snapshot: ShipmentSnapshot, ctx: RuleContext): ExceptionFinding | null;
}

const HOUR_MS = 3_600_000;

function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / HOUR_MS;
}

function round(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export const delayThresholdRule: RuleEvaluator = {
  name: 'delay-threshold',
  type: 'delay',
  evaluate(s, ctx) {
    const delayHours = hoursBetween(s.scheduledEta, s.currentEtaEstimate);
    if (!(delayHours > ctx.thresholds.delayHours)) return null;
    return {
      shipmentId: s.shipmentId,
      type: 'delay',
      severity: delayHours > SEVERITY_CUTOFFS.delayHighHours ? 'high' : 'medium',
      summary: `Shipment delayed by ${round(delayHours, 1)} hours (threshold: ${ctx.thresholds.delayHours}h)`,
      details: { delayHours: round(delayHours), thresholdHours: ctx.thresholds.delayHours },
    };
  },
};

export const mlConfidenceRule: RuleEvaluator = {
  name: 'ml-confidence',
  type: 'ml_prediction',
  evaluate(s, ctx) {
    const confidence = s.mlDelayConfidence;
    if (!(confidence > ctx.thresholds.mlConfidence)) return null;
    return {
      shipmentId: s.shipmentId,
      type: 'ml_prediction',
      severity: confidence > SEVERITY_CUTOFFS.mlHighConfidence ? 'high' : 'medium',
      summary: `Model predicts delay with ${Math.round(confidence * 100)}% confidence`,
      details: {
        confidence,
        threshold: ctx.thresholds.mlConfidence,
        riskFactors: [...s.mlRiskFactors],
        ...(s.predictedDelayHours !== undefined
          ? { predictedDelayHours: s.predictedDelayHours }
          : {}),
      },
    };
  },
};

export const temperatureDeviationRule: RuleEvaluator = {
  name: 'temperature-deviation',
  type: 'temperature_deviation',
  evaluate(s, ctx) {
    const t = s.reeferTelemetry;
    if (!t) return null;
    const deviation = Math.abs(t.temperatureCelsius - t.setpointCelsius);
    if (!(deviation > ctx.thresholds.temperatureDeviationCelsius)) return null;
    const container = t.containerId ? `Container ${t.containerId}` : 'Reefer';
    return {
      shipmentId: s.shipmentId,
      type: 'temperature_deviation',
      severity: deviation > SEVERITY_CUTOFFS.temperatureHighCelsius ? 'high' : 'medium',
      summary: `${container} temperature deviation: ${deviation.toFixed(1)}°C`,
      details: {
        temperatureCelsius: t.temperatureCelsius,
        setpointCelsius: t.setpointCelsius,
        deviationCelsius: round(deviation),
        thresholdCelsius: ctx.thresholds.temperatureDeviationCelsius,
        ...(t.containerId ? { containerId: t.containerId } : {}),
      },
    };
  },
};

export const geofenceViolationRule: RuleEvaluator = {
  name: 'geofence-violation',
  type: 'geofence_violation',
  evaluate(s) {
    const position = s.currentPosition;
    const corridor = s.expectedRouteCorridor;
    if (!position || !corridor) return null;
    const outsideKm = distanceOutsideCorridorKm(position, corridor);
    if (!(outsideKm > 0)) return null;
    return {
      shipmentId: s.shipmentId,
      type: 'geofence_violation',
      severity: 'high',
      summary: `Shipment ${round(outsideKm, 1)} km outside expected route`,
      details: {
        position: { lat: position.lat, lon: position.lon },
        corridorKind: corridor.kind,
        distanceOutsideKm: round(outsideKm),
      },
    };
  },
};

export const missingMilestoneRule: RuleEvaluator = {
  name: 'missing-milestone',
  type: 'missing_milestone',
  evaluate(s, ctx) {
    const sinceHours = hoursBetween(s.lastMilestoneAt, ctx.now);
    if (!(sinceHours > ctx.thresholds.missingMilestoneHours)) return null;
    return {
      shipmentId: s.shipmentId,
      type: 'missing_milestone',
      severity: 'low',
      summary: `No milestone reported for ${Math.round(sinceHours)} hours`,
      details: {
        hoursSinceLastMilestone: round(sinceHours),
        thresholdHours: ctx.thresholds.missingMilestoneHours,
        expectedIntervalHours: s.expectedMilestoneIntervalHours,
      },
    };
  },
};

/** Declaration order doubles as the dedup tie-break. */
export const RULES: readonly RuleEvaluator[] = [
  delayThresholdRule,
  mlConfidenceRule,
  temperatureDeviationRule,
  geofenceViolationRule,
  missingMilestoneRule,
];
