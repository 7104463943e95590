import { z } from 'zod';
import { ClassificationError, NotFoundError } from '../core/errors.js';
import type { DelayPrediction } from '../core/types.js';
import { DEFAULT_THRESHOLDS, type RuleThresholds } from '../rules/thresholds.js';
import type { SnapshotProvider } from './snapshotProvider.js';

export interface DelayClassifier {
  predict(shipmentId: string): Promise<DelayPrediction>;
}

/**
 * Answers from the ML signals the snapshot already carries. Used when no
 * prediction service is deployed.
 */
export class SnapshotSignalClassifier implements DelayClassifier {
  constructor(
    private readonly provider: SnapshotProvider,
    private readonly thresholds: Readonly<RuleThresholds> = DEFAULT_THRESHOLDS,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async predict(shipmentId: string): Promise<DelayPrediction> {
    const fleet = await this.provider.listActiveShipments(this.clock());
    const snapshot = fleet.find((s) => s.shipmentId === shipmentId);
    if (!snapshot) throw new NotFoundError(`Shipment ${shipmentId} not found`);
    return {
      willDelay: snapshot.mlDelayConfidence > this.thresholds.mlConfidence,
      confidence: snapshot.mlDelayConfidence,
      riskFactors: [...snapshot.mlRiskFactors],
      ...(snapshot.predictedDelayHours !== undefined
        ? { predictedDelayHours: snapshot.predictedDelayHours }
        : {}),
    };
  }
}

const PredictionResponseSchema = z.object({
  will_delay: z.boolean(),
  confidence: z.number().min(0).max(1),
  risk_factors: z.array(z.string()).default([]),
  predicted_delay_hours: z.number().nonnegative().nullish(),
});

/** Calls the prediction service at `POST <baseUrl>/predict-delay`. */
export class HttpDelayClassifier implements DelayClassifier {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async predict(shipmentId: string): Promise<DelayPrediction> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/predict-delay`;
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ shipment_id: shipmentId }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ClassificationError(`Prediction service unreachable at ${url}`, err);
    }
    if (res.status === 404) throw new NotFoundError(`Shipment ${shipmentId} not found`);
    if (!res.ok) throw new ClassificationError(`Prediction service responded ${res.status}`);
    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new ClassificationError('Prediction service returned invalid JSON', err);
    }
    const parsed = PredictionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ClassificationError('Prediction service returned an unexpected payload', parsed.error);
    }
    const p = parsed.data;
    return {
      willDelay: p.will_delay,
      confidence: p.confidence,
      riskFactors: p.risk_factors,
      ...(p.predicted_delay_hours != null ? { predictedDelayHours: p.predicted_delay_hours } : {}),
    };
  }
}
