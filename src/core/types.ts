// Domain model shared by the rules, the dispatcher and the run history

export type Severity = 'low' | 'medium' | 'high';

export type ExceptionType =
  | 'delay'
  | 'ml_prediction'
  | 'temperature_deviation'
  | 'geofence_violation'
  | 'missing_milestone';

export type NotificationChannel = 'email' | 'sms';
export type Language = 'en' | 'es' | 'zh';
export const SUPPORTED_LANGUAGES: readonly Language[] = ['en', 'es', 'zh'];

export interface GeoPoint {
  lat: number;
  lon: number;
}

export type RouteCorridor =
  | { kind: 'polygon'; vertices: readonly GeoPoint[] }
  | { kind: 'corridor'; waypoints: readonly GeoPoint[]; halfWidthKm: number };

export interface ReeferTelemetry {
  temperatureCelsius: number;
  setpointCelsius: number;
  containerId?: string;
}

export interface ShipmentSnapshot {
  readonly shipmentId: string;
  readonly scheduledEta: Date;
  readonly currentEtaEstimate: Date;
  readonly mlDelayConfidence: number;
  readonly mlRiskFactors: readonly string[];
  readonly predictedDelayHours?: number;
  readonly reeferTelemetry?: Readonly<ReeferTelemetry>;
  readonly currentPosition?: Readonly<GeoPoint>;
  readonly expectedRouteCorridor?: RouteCorridor;
  readonly lastMilestoneAt: Date;
  readonly expectedMilestoneIntervalHours: number;
  readonly language?: string;
}

export interface DelayDetails {
  delayHours: number;
  thresholdHours: number;
}

export interface MlPredictionDetails {
  confidence: number;
  threshold: number;
  riskFactors: string[];
  predictedDelayHours?: number;
}

export interface TemperatureDeviationDetails {
  temperatureCelsius: number;
  setpointCelsius: number;
  deviationCelsius: number;
  thresholdCelsius: number;
  containerId?: string;
}

export interface GeofenceViolationDetails {
  position: GeoPoint;
  corridorKind: RouteCorridor['kind'];
  distanceOutsideKm: number;
}

export interface MissingMilestoneDetails {
  hoursSinceLastMilestone: number;
  thresholdHours: number;
  expectedIntervalHours: number;
}

interface FindingBase {
  shipmentId: string;
  severity: Severity;
  summary: string;
}

export type ExceptionFinding =
  | (FindingBase & { type: 'delay'; details: DelayDetails })
  | (FindingBase & { type: 'ml_prediction'; details: MlPredictionDetails })
  | (FindingBase & { type: 'temperature_deviation'; details: TemperatureDeviationDetails })
  | (FindingBase & { type: 'geofence_violation'; details: GeofenceViolationDetails })
  | (FindingBase & { type: 'missing_milestone'; details: MissingMilestoneDetails });

export interface MonitorRunRecord {
  runTimestamp: Date;
  shipmentsChecked: number;
  exceptionsFound: number;
  notificationsSent: number;
  runDurationMs: number;
  error?: string;
}

export interface NotificationRecord {
  notificationId: string;
  shipmentId: string;
  type: ExceptionType | 'delayed';
  sentAt: Date;
  channels: NotificationChannel[];
  language: Language;
}

export interface DelayPrediction {
  willDelay: boolean;
  confidence: number;
  riskFactors: string[];
  predictedDelayHours?: number;
}
