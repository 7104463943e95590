import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SnapshotUnavailableError } from '../core/errors.js';
import type { GeoPoint, RouteCorridor, ShipmentSnapshot } from '../core/types.js';
import { getComponentLogger } from '../utils/logging.js';

export interface SnapshotProvider {
  /** Every returned snapshot reflects the same `asOf` instant. Safe to call repeatedly. */
  listActiveShipments(asOf: Date): Promise<readonly ShipmentSnapshot[]>;
}

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

const corridorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('polygon'), vertices: z.array(geoPointSchema).min(3) }),
  z.object({
    kind: z.literal('corridor'),
    waypoints: z.array(geoPointSchema).min(1),
    halfWidthKm: z.number().positive(),
  }),
]);

export const shipmentRecordSchema = z.object({
  shipmentId: z.string().min(1, 'Shipment id cannot be empty'),
  status: z.string().optional(),
  scheduledEta: isoDate,
  currentEtaEstimate: isoDate,
  mlDelayConfidence: z.number().min(0).max(1),
  mlRiskFactors: z.array(z.string()).default([]),
  predictedDelayHours: z.number().nonnegative().optional(),
  reeferTelemetry: z
    .object({
      temperatureCelsius: z.number(),
      setpointCelsius: z.number(),
      containerId: z.string().min(1).optional(),
    })
    .optional(),
  currentPosition: geoPointSchema.optional(),
  expectedRouteCorridor: corridorSchema.optional(),
  lastMilestoneAt: isoDate,
  expectedMilestoneIntervalHours: z.number().positive().default(24),
  language: z.string().min(2).optional(),
});

export type ShipmentRecord = z.infer<typeof shipmentRecordSchema>;

function freezePoints(points: readonly GeoPoint[]): readonly GeoPoint[] {
  return Object.freeze(points.map((p) => Object.freeze({ ...p })));
}

function freezeCorridor(corridor: RouteCorridor): RouteCorridor {
  return corridor.kind === 'polygon'
    ? Object.freeze({ kind: corridor.kind, vertices: freezePoints(corridor.vertices) })
    : Object.freeze({
        kind: corridor.kind,
        waypoints: freezePoints(corridor.waypoints),
        halfWidthKm: corridor.halfWidthKm,
      });
}

export function toSnapshot(record: ShipmentRecord): ShipmentSnapshot {
  const snapshot: ShipmentSnapshot = {
    shipmentId: record.shipmentId,
    scheduledEta: record.scheduledEta,
    currentEtaEstimate: record.currentEtaEstimate,
    mlDelayConfidence: record.mlDelayConfidence,
    mlRiskFactors: Object.freeze([...record.mlRiskFactors]),
    lastMilestoneAt: record.lastMilestoneAt,
    expectedMilestoneIntervalHours: record.expectedMilestoneIntervalHours,
    ...(record.predictedDelayHours !== undefined
      ? { predictedDelayHours: record.predictedDelayHours }
      : {}),
    ...(record.reeferTelemetry ? { reeferTelemetry: Object.freeze({ ...record.reeferTelemetry }) } : {}),
    ...(record.currentPosition ? { currentPosition: Object.freeze({ ...record.currentPosition }) } : {}),
    ...(record.expectedRouteCorridor
      ? { expectedRouteCorridor: freezeCorridor(record.expectedRouteCorridor) }
      : {}),
    ...(record.language ? { language: record.language } : {}),
  };
  return Object.freeze(snapshot);
}

/**
 * Reads the fleet from a JSON array on disk. The file is read once per call so
 * the returned set is one consistent view. Delivered shipments are not active.
 * Invalid records are skipped with a warning.
 */
export class JsonFileSnapshotProvider implements SnapshotProvider {
  constructor(private readonly dataPath: string) {}

  async listActiveShipments(asOf: Date): Promise<readonly ShipmentSnapshot[]> {
    const log = getComponentLogger('snapshot-provider');
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.dataPath, 'utf-8'));
    } catch (err) {
      throw new SnapshotUnavailableError(`Failed to read shipment snapshot ${this.dataPath}`, err);
    }
    if (!Array.isArray(raw)) {
      throw new SnapshotUnavailableError(`Shipment snapshot ${this.dataPath} is not an array`);
    }
    const out: ShipmentSnapshot[] = [];
    let skipped = 0;
    for (const item of raw) {
      const parsed = shipmentRecordSchema.safeParse(item);
      if (!parsed.success) {
        skipped++;
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
        log.warn({ issues }, 'snapshot-record-invalid');
        continue;
      }
      if (parsed.data.status === 'delivered') continue;
      out.push(toSnapshot(parsed.data));
    }
    log.debug({ asOf: asOf.toISOString(), active: out.length, skipped }, 'snapshot-loaded');
    return out;
  }
}

/** Serves a fixed fleet; used by tests and one-off CLI runs. */
export class StaticSnapshotProvider implements SnapshotProvider {
  constructor(private readonly snapshots: readonly ShipmentSnapshot[]) {}

  async listActiveShipments(): Promise<readonly ShipmentSnapshot[]> {
    return this.snapshots;
  }
}
