import crypto from 'crypto';

export const SIGNATURE_HEADER = 'x-monitor-signature';

export function hmacSign(body: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}

export function verifySignature(body: string, secret: string, signature: string): boolean {
  const expected = Buffer.from(hmacSign(body, secret), 'hex');
  const given = Buffer.from(signature, 'hex');
  return expected.length === given.length && crypto.timingSafeEqual(expected, given);
}

export function buildCanonicalPayload(obj: unknown): string {
  // Stable stringify by sorting object keys recursively
  return JSON.stringify(sortObj(obj));
}

function sortObj(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortObj);
  if (value instanceof Date) return value.toISOString();
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[key] = sortObj(v);
    }
    return out;
  }
  return value;
}
