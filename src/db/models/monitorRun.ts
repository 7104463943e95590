import { Schema, model } from 'mongoose';

const monitorRunSchema = new Schema(
  {
    runTimestamp: { type: Date, required: true },
    shipmentsChecked: { type: Number, required: true, min: 0 },
    exceptionsFound: { type: Number, required: true, min: 0 },
    notificationsSent: { type: Number, required: true, min: 0 },
    runDurationMs: { type: Number, required: true, min: 0 },
    error: { type: String },
  },
  { collection: 'monitor_runs', timestamps: { createdAt: true, updatedAt: false } },
);

monitorRunSchema.index({ runTimestamp: -1 });

export const MonitorRunModel = model('MonitorRun', monitorRunSchema);
