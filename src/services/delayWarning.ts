import type { Language, NotificationChannel, NotificationRecord } from '../core/types.js';
import { delayWarningsTotal } from '../metrics/index.js';
import type { RuleThresholds } from '../rules/thresholds.js';
import { getComponentLogger } from '../utils/logging.js';
import type { DelayClassifier } from './classifier.js';
import { channelsFor, type NotificationTransport, type Recipient } from './notificationTransport.js';
import { resolveLanguage, trackingUrl } from './templates.js';

export interface DelayWarningRequest extends Recipient {
  shipmentId: string;
  language?: string;
}

export type DelayWarningResult =
  | {
      warningSent: true;
      shipmentId: string;
      notificationId: string;
      confidence: number;
      threshold: number;
      riskFactors: string[];
      predictedDelayHours?: number;
      channels: NotificationChannel[];
      language: Language;
    }
  | {
      warningSent: false;
      shipmentId: string;
      reason: 'below_threshold' | 'no_recipient' | 'transport_rejected';
      confidence: number;
      threshold: number;
    };

export interface DelayWarningOptions {
  defaultLanguage: string;
  trackingBaseUrl: string;
}

const ACTION_RECOMMENDED =
  'Please contact your logistics coordinator for alternative routing options';

export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}

/**
 * Sends a customer-facing `delayed` warning when the classifier is confident
 * enough. Reads the same threshold object as the periodic ML rule, so the
 * two never disagree.
 */
export class DelayWarningService {
  constructor(
    private readonly classifier: DelayClassifier,
    private readonly transport: NotificationTransport,
    private readonly thresholds: Readonly<RuleThresholds>,
    private readonly opts: DelayWarningOptions,
  ) {}

  async warn(req: DelayWarningRequest): Promise<DelayWarningResult> {
    const log = getComponentLogger('delay-warning');
    const prediction = await this.classifier.predict(req.shipmentId);
    const threshold = this.thresholds.mlConfidence;
    const base = { shipmentId: req.shipmentId, confidence: prediction.confidence, threshold };

    if (!(prediction.confidence > threshold)) {
      delayWarningsTotal.inc({ result: 'below_threshold' });
      log.info(base, 'delay-warning-below-threshold');
      return { ...base, warningSent: false, reason: 'below_threshold' };
    }
    const channels = channelsFor(req);
    if (channels.length === 0) {
      delayWarningsTotal.inc({ result: 'no_recipient' });
      log.warn(base, 'delay-warning-no-recipient');
      return { ...base, warningSent: false, reason: 'no_recipient' };
    }

    const { language } = resolveLanguage(req.language ?? this.opts.defaultLanguage);
    const hours = prediction.predictedDelayHours;
    const result = await this.transport.send({
      channels,
      recipient: { email: req.email, phone: req.phone },
      language,
      templateKey: 'delayed',
      context: {
        shipment_id: req.shipmentId,
        ml_confidence: formatConfidence(prediction.confidence),
        risk_factors: prediction.riskFactors.join(', ') || 'Multiple factors',
        predicted_delay: hours !== undefined && hours > 0 ? `${hours} hours` : 'significant delay',
        action_recommended: ACTION_RECOMMENDED,
        tracking_url: trackingUrl(this.opts.trackingBaseUrl, req.shipmentId),
      },
    });
    if (!result.sent) {
      delayWarningsTotal.inc({ result: 'transport_rejected' });
      log.warn({ ...base, notificationId: result.notificationId }, 'delay-warning-rejected');
      return { ...base, warningSent: false, reason: 'transport_rejected' };
    }

    delayWarningsTotal.inc({ result: 'sent' });
    const record: NotificationRecord = {
      notificationId: result.notificationId,
      shipmentId: req.shipmentId,
      type: 'delayed',
      sentAt: new Date(),
      channels,
      language,
    };
    log.info({ ...record, confidence: prediction.confidence, threshold }, 'delay-warning-sent');
    return {
      ...base,
      warningSent: true,
      notificationId: result.notificationId,
      riskFactors: prediction.riskFactors,
      ...(hours !== undefined ? { predictedDelayHours: hours } : {}),
      channels,
      language,
    };
  }
}
