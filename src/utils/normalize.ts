import { CEFR_LEVELS, type CefrLevel, type WordFamily } from '../types';

const SURROUNDING_PUNCT = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const MULTI_SPACE = /\s+/g;

/**
 * Identity key of a term: lowercased, whitespace collapsed, leading and
 * trailing punctuation removed. "  Take-Off!! " -> "take-off".
 */
export function normalizeTerm(term: string | null | undefined): string {
  const collapsed = (term ?? '').trim().toLowerCase().replace(MULTI_SPACE, ' ');
  return collapsed.replace(SURROUNDING_PUNCT, '').replace(MULTI_SPACE, ' ').trim();
}

/**
 * Trimmed, non-empty strings in first-seen order. Duplicates are compared
 * case-sensitively. Non-array input yields an empty list.
 */
export function uniqueStrings(items: unknown): string[] {
  if (!Array.isArray(items)) return [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    if (item === null || item === undefined) continue;
    const text = String(item).trim();
    if (text && !seen.has(text)) {
      seen.add(text);
      out.push(text);
    }
  }
  return out;
}

export function mergeUniqueStrings(left: unknown, right: unknown): string[] {
  return uniqueStrings([...uniqueStrings(left), ...uniqueStrings(right)]);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Roles are lowercased and trimmed; each role's words deduplicated.
 */
export function normalizeWordFamily(data: unknown): WordFamily {
  if (!isRecord(data)) return {};
  const out: WordFamily = {};
  for (const [key, values] of Object.entries(data)) {
    const role = key.trim().toLowerCase();
    if (!role) continue;
    out[role] = mergeUniqueStrings(out[role], values);
  }
  return out;
}

export function mergeWordFamily(left: unknown, right: unknown): WordFamily {
  const merged = normalizeWordFamily(left);
  for (const [role, values] of Object.entries(normalizeWordFamily(right))) {
    merged[role] = mergeUniqueStrings(merged[role], values);
  }
  return merged;
}

/**
 * Trimmed string or null when empty / not a string-like value.
 */
export function optionalText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const text = String(value).trim();
  return text || null;
}

export function toCefrLevel(value: unknown): CefrLevel | null {
  if (typeof value !== 'string') return null;
  const level = value.trim().toUpperCase();
  return CEFR_LEVELS.find((candidate) => candidate === level) ?? null;
}
