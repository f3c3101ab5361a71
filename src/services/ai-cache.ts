import type { AICacheEntry, ContentBundle, Database } from '../types';
import { getCacheEntry, upsertCacheEntry } from '../db/queries';
import { stableHash } from '../utils/hash';

export const CACHE_VERSION = 'v1';

export type CacheOperation = 'enrich' | 'judge' | 'validate';

const LIST_KEYS = ['examples', 'mnemonics', 'meaningVariants', 'synonymGroups', 'distractors'] as const;

/**
 * Cache key: `<operation>:<version>:<termNormalized>[:<contentHash>]`
 */
export function cacheKey(operation: CacheOperation, termNormalized: string, contentHash?: string): string {
  const base = `${operation}:${CACHE_VERSION}:${termNormalized}`;
  return contentHash ? `${base}:${contentHash}` : base;
}

function asList<T>(value: T[] | undefined): T[] {
  return Array.isArray(value) ? value : [];
}

// Union of both lists; items compare by content fingerprint, so two
// example pairs with the same text collapse into one.
function mergeByFingerprint<T>(existing: T[] | undefined, incoming: T[] | undefined): T[] {
  const seen = new Set<string>();
  const merged: T[] = [];
  for (const item of [...asList(existing), ...asList(incoming)]) {
    const fingerprint = stableHash(item);
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);
    merged.push(item);
  }
  return merged;
}

/**
 * Fold freshly generated content into what the cache already holds.
 * List keys present in `incoming` are unioned, `judge` is replaced, and
 * `ipa` is replaced only by a non-blank value.
 */
export function mergeContent(existing: ContentBundle, incoming: ContentBundle): ContentBundle {
  const merged: ContentBundle = { ...existing };

  for (const key of LIST_KEYS) {
    if (!(key in incoming)) continue;
    switch (key) {
      case 'examples':
        merged.examples = mergeByFingerprint(existing.examples, incoming.examples);
        break;
      case 'synonymGroups':
        merged.synonymGroups = mergeByFingerprint(existing.synonymGroups, incoming.synonymGroups);
        break;
      default:
        merged[key] = mergeByFingerprint(existing[key], incoming[key]);
    }
  }

  if (incoming.judge !== undefined) {
    merged.judge = incoming.judge;
  }

  const ipa = typeof incoming.ipa === 'string' ? incoming.ipa.trim() : '';
  if (ipa) {
    merged.ipa = ipa;
  }

  return merged;
}

export function getCache(db: Database, key: string): AICacheEntry | null {
  return getCacheEntry(db, key);
}

export function upsertCache(
  db: Database,
  entry: { key: string; termNormalized: string; provider: string; data: ContentBundle; now: Date; version?: string }
): AICacheEntry {
  return upsertCacheEntry(db, {
    key: entry.key,
    termNormalized: entry.termNormalized,
    version: entry.version ?? CACHE_VERSION,
    provider: entry.provider,
    data: entry.data,
    now: entry.now.toISOString(),
  });
}
