import crypto from 'crypto';

const ID_PATTERN = /^NOTIF-\d{8}-[0-9a-f]{8}$/;

/**
 * `NOTIF-<YYYYMMDD UTC>-<8 hex>`. The date prefix keeps ids sortable by day;
 * the suffix comes from a random UUID.
 */
export function generateNotificationId(at: Date = new Date()): string {
  const y = at.getUTCFullYear().toString().padStart(4, '0');
  const m = (at.getUTCMonth() + 1).toString().padStart(2, '0');
  const d = at.getUTCDate().toString().padStart(2, '0');
  const suffix = crypto.randomUUID().replace(/-/g, '').slice(0, 8);
  return `NOTIF-${y}${m}${d}-${suffix}`;
}

export function isNotificationId(value: string): boolean {
  return ID_PATTERN.test(value);
}
