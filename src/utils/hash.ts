import { createHash } from 'node:crypto';

/**
 * Canonical JSON: object keys sorted at every level, Dates as ISO strings,
 * undefined object members dropped (as JSON.stringify does).
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
      out[key] = sortKeys(item);
    }
    return out;
  }
  return value;
}

/**
 * Deterministic SHA-256 fingerprint of a JSON-compatible value.
 */
export function stableHash(value: unknown): string {
  return createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex');
}
