export interface RuleThresholds {
  delayHours: number;
  mlConfidence: number;
  temperatureDeviationCelsius: number;
  missingMilestoneHours: number;
}

/**
 * ML confidence a prediction must strictly exceed. Shared by the periodic
 * ML-Confidence rule and the on-demand delay-warning gate.
 */
export const ML_CONFIDENCE_THRESHOLD = 0.7;

export const DEFAULT_THRESHOLDS: Readonly<RuleThresholds> = Object.freeze({
  delayHours: 24,
  mlConfidence: ML_CONFIDENCE_THRESHOLD,
  temperatureDeviationCelsius: 5.0,
  missingMilestoneHours: 72,
});

// Severity escalation cutoffs (not configurable)
export const SEVERITY_CUTOFFS = Object.freeze({
  delayHighHours: 48,
  mlHighConfidence: 0.85,
  temperatureHighCelsius: 10.0,
});
