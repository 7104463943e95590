import fs from 'fs';
import { z } from 'zod';
import {
  SUPPORTED_LANGUAGES,
  type ExceptionFinding,
  type ExceptionType,
  type Language,
} from '../core/types.js';

export type TemplateKey = ExceptionType | 'delayed';
export type TemplateContext = Record<string, string | number>;

export interface RenderedMessage {
  language: Language;
  subject: string;
  body: string;
  sms: string;
}

const TemplateSchema = z.object({
  subject: z.string().min(1),
  body: z.string().min(1),
  sms: z.string().min(1),
});
const LanguageTemplatesSchema = z
  .object({ en: TemplateSchema, es: TemplateSchema.optional(), zh: TemplateSchema.optional() })
  .strict();
const TemplateFileSchema = z.record(LanguageTemplatesSchema);

type TemplateFile = z.infer<typeof TemplateFileSchema>;

export const DEFAULT_TEMPLATE_PATH = new URL('../../templates/notifications.json', import.meta.url);

let cached: TemplateFile | null = null;

export function loadTemplates(file: URL | string = DEFAULT_TEMPLATE_PATH): TemplateFile {
  return TemplateFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
}

function templates(): TemplateFile {
  if (!cached) cached = loadTemplates();
  return cached;
}

function isLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((l) => l === value);
}

/** Normalizes `es-MX` style tags; anything unsupported falls back to `en`. */
export function resolveLanguage(requested: string | undefined): {
  language: Language;
  fellBack: boolean;
} {
  if (!requested) return { language: 'en', fellBack: false };
  const primary = requested.trim().toLowerCase().split(/[-_]/)[0];
  if (isLanguage(primary)) return { language: primary, fellBack: false };
  return { language: 'en', fellBack: true };
}

// Unknown placeholders stay as written
export function fillPlaceholders(text: string, context: TemplateContext): string {
  return text.replace(/\{([a-z_]+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(context, key) ? String(context[key]) : match,
  );
}

export function renderTemplate(
  key: TemplateKey,
  language: Language,
  context: TemplateContext,
): RenderedMessage {
  const entry = templates()[key];
  if (!entry) throw new Error(`No notification template for ${key}`);
  const chosen = entry[language] ? language : 'en';
  const t = entry[chosen] ?? entry.en;
  return {
    language: chosen,
    subject: fillPlaceholders(t.subject, context),
    body: fillPlaceholders(t.body, context),
    sms: fillPlaceholders(t.sms, context),
  };
}

export function trackingUrl(baseUrl: string, shipmentId: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(shipmentId)}`;
}

export function findingTemplateContext(
  finding: ExceptionFinding,
  trackingBaseUrl: string,
): TemplateContext {
  const common: TemplateContext = {
    shipment_id: finding.shipmentId,
    severity: finding.severity,
    summary: finding.summary,
    tracking_url: trackingUrl(trackingBaseUrl, finding.shipmentId),
  };
  switch (finding.type) {
    case 'delay':
      return { ...common, delay_hours: finding.details.delayHours };
    case 'ml_prediction':
      return {
        ...common,
        confidence_pct: Math.round(finding.details.confidence * 100),
        risk_factors: finding.details.riskFactors.join(', ') || 'none reported',
      };
    case 'temperature_deviation':
      return {
        ...common,
        temperature_c: finding.details.temperatureCelsius,
        setpoint_c: finding.details.setpointCelsius,
        deviation_c: finding.details.deviationCelsius,
      };
    case 'geofence_violation':
      return {
        ...common,
        distance_km: finding.details.distanceOutsideKm,
        position: `${finding.details.position.lat},${finding.details.position.lon}`,
      };
    case 'missing_milestone':
      return {
        ...common,
        hours_since: Math.round(finding.details.hoursSinceLastMilestone),
        expected_interval_hours: finding.details.expectedIntervalHours,
      };
  }
}
