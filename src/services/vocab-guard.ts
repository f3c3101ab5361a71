import type { Database, EntryValidation, InputMethod } from '../types';
import { stableHash } from '../utils/hash';
import { normalizeTerm } from '../utils/normalize';
import { cacheKey, getCache, upsertCache } from './ai-cache';
import type { ContentProvider } from './ai';
import { withFallback } from './enrichment';

export interface EntryCheck {
  checked: boolean;
  accepted: boolean;
  provider: string;
  fromCache: boolean;
  result: EntryValidation | null;
}

// Meanings deduplicated by normalized form, first spelling kept
function cleanMeanings(meanings: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const meaning of meanings) {
    const text = meaning.trim();
    const key = normalizeTerm(text);
    if (!text || seen.has(key)) continue;
    seen.add(key);
    out.push(text);
  }
  return out;
}

function isAccepted(result: EntryValidation): boolean {
  return result.isTermValid && result.isMeaningPlausible;
}

/**
 * Lexical sanity check for hand-typed entries. Pasted entries are trusted.
 * Verdicts are cached per term and meaning set.
 */
export async function validateTypedEntry(
  db: Database,
  provider: ContentProvider,
  input: { term: string; meanings?: string[]; inputMethod?: InputMethod },
  now: Date = new Date()
): Promise<EntryCheck> {
  if (input.inputMethod !== 'typed') {
    return { checked: false, accepted: true, provider: 'skipped', fromCache: false, result: null };
  }

  const term = input.term.trim();
  const termNormalized = normalizeTerm(term);
  const meanings = cleanMeanings(input.meanings ?? []);

  if (!termNormalized) {
    return {
      checked: true,
      accepted: false,
      provider: 'local',
      fromCache: false,
      result: {
        isTermValid: false,
        isMeaningPlausible: true,
        suggestedTerm: '',
        suggestedMeanings: meanings,
        reasonShort: 'Empty term after normalization',
      },
    };
  }

  const key = cacheKey(
    'validate',
    termNormalized,
    stableHash({ term, meanings: meanings.map((meaning) => normalizeTerm(meaning)).sort() })
  );

  const cached = getCache(db, key);
  if (cached?.data.validate) {
    const result = cached.data.validate;
    return { checked: true, accepted: isAccepted(result), provider: cached.provider, fromCache: true, result };
  }

  const outcome = await withFallback('validate', provider, (p) => p.validateEntry({ term, meanings }));
  upsertCache(db, { key, termNormalized, provider: outcome.provider, data: { validate: outcome.value }, now });

  if (!isAccepted(outcome.value)) {
    console.log(`[AI] Rejected typed entry "${term}": ${outcome.value.reasonShort}`);
  }

  return {
    checked: true,
    accepted: isAccepted(outcome.value),
    provider: outcome.provider,
    fromCache: false,
    result: outcome.value,
  };
}
