import { z } from 'zod';
import type { StoredRunRecord } from '../../repositories/runHistoryRepository.js';
import { MAX_HISTORY_LIMIT } from '../../repositories/runHistoryRepository.js';

export const listRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).optional(),
});

export const triggerQuerySchema = z.object({
  wait: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),
});

export const delayWarningBodySchema = z
  .object({
    email: z.string().email().optional(),
    phone: z.string().min(3).optional(),
    language: z.string().min(2).max(16).optional(),
  })
  .strict();

export function toPublicRun(run: StoredRunRecord) {
  return {
    id: run.id,
    runTimestamp: run.runTimestamp.toISOString(),
    shipmentsChecked: run.shipmentsChecked,
    exceptionsFound: run.exceptionsFound,
    notificationsSent: run.notificationsSent,
    runDurationMs: run.runDurationMs,
    ...(run.error ? { error: run.error } : {}),
  };
}
