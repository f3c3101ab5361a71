import type {
  Card,
  ContentBundle,
  Database,
  ExamplePair,
  JudgeVerdict,
  SpeakingFeedback,
  UpsertCardRequest,
} from '../types';
import { getCardById, getCardByTermNormalized, replaceCard } from '../db/queries';
import { ValidationError } from '../errors';
import { stableHash } from '../utils/hash';
import { normalizeTerm, uniqueStrings } from '../utils/normalize';
import { cacheKey, getCache, mergeContent, upsertCache } from './ai-cache';
import {
  needsAnything,
  StubContentProvider,
  type ContentProvider,
  type EnrichMissing,
  type SpeakingInput,
} from './ai';
import { isNearCorrect, upsertCard, type UpsertCardOutcome } from './cards';

export const MIN_EXAMPLES = 1;
export const MIN_MNEMONICS = 1;
export const TARGET_MEANINGS = 2;

/**
 * Run a provider call, retrying once against the local stub when the
 * configured provider fails.
 */
export async function withFallback<T>(
  operation: string,
  provider: ContentProvider,
  call: (provider: ContentProvider) => Promise<T>
): Promise<{ value: T; provider: string }> {
  try {
    return { value: await call(provider), provider: provider.name };
  } catch (err) {
    console.error(`[AI] ${operation} failed on ${provider.name}, using stub:`, err);
    const fallback = new StubContentProvider();
    return { value: await call(fallback), provider: fallback.name };
  }
}

function hasText(value: string | null | undefined): boolean {
  return Boolean(value?.trim());
}

function isEmptyBundle(bundle: ContentBundle): boolean {
  return Object.values(bundle).every(
    (value) => value === null || value === undefined || (Array.isArray(value) && value.length === 0)
  );
}

// Cached examples, with the card's own example first when it has one
function collectExamples(card: Card | null, data: ContentBundle): ExamplePair[] {
  const examples = [...(data.examples ?? [])];
  const en = card?.exampleEn?.trim();
  const vi = card?.exampleVi?.trim();
  if (en && vi && !examples.some((example) => example.en === en && example.vi === vi)) {
    examples.unshift({ en, vi });
  }
  return examples;
}

function collectMnemonics(card: Card | null, data: ContentBundle): string[] {
  return uniqueStrings([...(data.mnemonics ?? []), ...(card?.mnemonic ? [card.mnemonic] : [])]);
}

// Fill the card's empty fields from enrichment data
function fillCardFromContent(db: Database, id: string, data: ContentBundle, now: Date): Card | null {
  const card = getCardById(db, id);
  if (!card) return null;

  const next: Card = { ...card };
  let changed = false;

  // Both halves of the example always come from the same pair
  const examples = data.examples ?? [];
  const en = card.exampleEn?.trim();
  const vi = card.exampleVi?.trim();
  const pair = !en && !vi
    ? examples[0]
    : !vi
      ? examples.find((example) => example.en === en)
      : !en
        ? examples.find((example) => example.vi === vi)
        : undefined;
  if (pair) {
    next.exampleEn = pair.en;
    next.exampleVi = pair.vi;
    changed = true;
  }

  const [firstMnemonic] = collectMnemonics(card, data);
  if (firstMnemonic && !hasText(card.mnemonic)) {
    next.mnemonic = firstMnemonic;
    changed = true;
  }

  if (card.meanings.length < TARGET_MEANINGS) {
    const meanings = uniqueStrings([...card.meanings, ...(data.meaningVariants ?? [])]);
    if (meanings.length !== card.meanings.length) {
      next.meanings = meanings;
      changed = true;
    }
  }

  const ipa = data.ipa?.trim();
  if (ipa && !hasText(card.ipa)) {
    next.ipa = ipa;
    changed = true;
  }

  if (!changed) return card;
  next.updatedAt = now.toISOString();
  replaceCard(db, next);
  return next;
}

export interface ContentSuggestions {
  examples: ExamplePair[];
  mnemonics: string[];
  meaningVariants: string[];
  ipa: string | null;
  synonymGroups: string[][];
  distractors: string[];
}

/**
 * Learning content offered to the client: the card's own content first,
 * then whatever the cache holds.
 */
export function buildSuggestions(card: Card | null, data: ContentBundle): ContentSuggestions {
  return {
    examples: collectExamples(card, data),
    mnemonics: collectMnemonics(card, data),
    meaningVariants: uniqueStrings(data.meaningVariants),
    ipa: card?.ipa?.trim() || data.ipa?.trim() || null,
    synonymGroups: data.synonymGroups ?? [],
    distractors: data.distractors ?? [],
  };
}

export interface EnrichResult {
  termNormalized: string;
  provider: string;
  aiCalled: boolean;
  fromCache: boolean;
  data: ContentSuggestions;
  card: Card | null;
}

export interface EnrichInput {
  term: string;
  meaningsExisting?: string[];
  // Ask the provider for every kind of content, even what is already stored
  force?: boolean;
}

/**
 * Top up learning content for a term. The provider is only asked for what
 * neither the card nor the cache already has; results are merged into the
 * cache and copied into the card's empty fields.
 */
export async function enrichTerm(
  db: Database,
  provider: ContentProvider,
  input: EnrichInput,
  now: Date = new Date()
): Promise<EnrichResult> {
  const termNormalized = normalizeTerm(input.term);
  if (!termNormalized) {
    throw new ValidationError('Term is empty after normalization', 'term');
  }

  const card = getCardByTermNormalized(db, termNormalized);
  const key = cacheKey('enrich', termNormalized);
  const cached = getCache(db, key);
  const cacheData = cached?.data ?? {};

  const allMeanings = uniqueStrings([...(card?.meanings ?? []), ...(input.meaningsExisting ?? [])]);
  const hasCoreContent =
    allMeanings.length >= TARGET_MEANINGS && hasText(card?.exampleEn) && hasText(card?.mnemonic);

  const force = input.force === true;
  const missing: EnrichMissing = {
    needExamples: force || (!hasCoreContent && collectExamples(card, cacheData).length < MIN_EXAMPLES),
    needMnemonics: force || (!hasCoreContent && collectMnemonics(card, cacheData).length < MIN_MNEMONICS),
    needMeaningVariants: force || (!hasCoreContent && allMeanings.length < TARGET_MEANINGS),
    needIpa: force || (!hasText(card?.ipa) && !hasText(cacheData.ipa)),
  };

  let generated: ContentBundle = {};
  let providerUsed = cached?.provider ?? 'stub';
  const aiCalled = needsAnything(missing);

  if (aiCalled) {
    const request = { term: input.term.trim(), meanings: allMeanings, missing };
    const outcome = await withFallback('enrich', provider, (p) => p.enrich(request));
    generated = outcome.value;
    providerUsed = outcome.provider;

    if (isEmptyBundle(generated) && providerUsed !== 'stub') {
      console.warn(`[AI] ${providerUsed} returned no content for "${termNormalized}", using stub`);
      const fallback = new StubContentProvider();
      generated = await fallback.enrich(request);
      providerUsed = fallback.name;
    }
  }

  // Provider call is done. Cache and card may have changed while it ran,
  // so both are read again and merged inside one transaction.
  const { data, updatedCard } = db.transaction(() => {
    const latest = getCache(db, key);
    let merged = mergeContent(latest?.data ?? {}, generated);
    if (!latest || Object.keys(generated).length > 0 || force) {
      merged = upsertCache(db, { key, termNormalized, provider: providerUsed, data: merged, now }).data;
    }
    const current = getCardByTermNormalized(db, termNormalized);
    return { data: merged, updatedCard: current ? fillCardFromContent(db, current.id, merged, now) : null };
  })();

  return {
    termNormalized,
    provider: providerUsed,
    aiCalled,
    fromCache: cached !== null && !aiCalled,
    data: buildSuggestions(updatedCard, data),
    card: updatedCard,
  };
}

/**
 * Record an answer judged equivalent: add it to the card's meanings and to
 * the enrich cache's meaning variants, unless already present.
 */
export function learnEquivalentAnswer(
  db: Database,
  termNormalized: string,
  userAnswer: string,
  provider: string,
  now: Date
): void {
  const answer = userAnswer.trim();
  const normalizedAnswer = normalizeTerm(answer);
  if (!normalizedAnswer) return;

  db.transaction(() => {
    const card = getCardByTermNormalized(db, termNormalized);
    if (card && !card.meanings.some((meaning) => normalizeTerm(meaning) === normalizedAnswer)) {
      replaceCard(db, { ...card, meanings: [...card.meanings, answer], updatedAt: now.toISOString() });
    }

    const key = cacheKey('enrich', termNormalized);
    const cached = getCache(db, key);
    const data = cached?.data ?? {};
    const variants = uniqueStrings(data.meaningVariants);
    if (!variants.some((variant) => normalizeTerm(variant) === normalizedAnswer)) {
      upsertCache(db, {
        key,
        termNormalized,
        provider: cached?.provider ?? provider,
        data: { ...data, meaningVariants: [...variants, answer] },
        now,
      });
    }
  })();
}

export interface JudgeResult extends JudgeVerdict {
  provider: string;
  cached: boolean;
}

/**
 * Decide whether a free-text answer means the same as the reference
 * meanings: fuzzy match first, then a cached verdict, then the provider.
 */
export async function judgeAnswer(
  db: Database,
  provider: ContentProvider,
  input: { term: string; userAnswer: string; meanings?: string[] },
  now: Date = new Date()
): Promise<JudgeResult> {
  const termNormalized = normalizeTerm(input.term);
  if (!termNormalized) {
    throw new ValidationError('Term is empty after normalization', 'term');
  }

  const meanings = uniqueStrings(input.meanings);
  const contentHash = stableHash({
    userAnswer: normalizeTerm(input.userAnswer),
    meanings: meanings.map((meaning) => normalizeTerm(meaning)).sort(),
  });
  const key = cacheKey('judge', termNormalized, contentHash);

  if (isNearCorrect(input.userAnswer, meanings)) {
    const verdict: JudgeVerdict = { isEquivalent: true, reasonShort: 'fuzzy match' };
    upsertCache(db, { key, termNormalized, provider: 'fuzzy', data: { judge: verdict }, now });
    learnEquivalentAnswer(db, termNormalized, input.userAnswer, 'fuzzy', now);
    return { ...verdict, provider: 'fuzzy', cached: false };
  }

  const cached = getCache(db, key);
  if (cached?.data.judge) {
    const verdict = cached.data.judge;
    if (verdict.isEquivalent) {
      learnEquivalentAnswer(db, termNormalized, input.userAnswer, cached.provider, now);
    }
    return {
      isEquivalent: verdict.isEquivalent,
      reasonShort: verdict.reasonShort || 'cached',
      provider: cached.provider,
      cached: true,
    };
  }

  const outcome = await withFallback('judge', provider, (p) =>
    p.judgeEquivalence({ term: input.term.trim(), userAnswer: input.userAnswer.trim(), meanings })
  );
  const verdict = outcome.value;

  upsertCache(db, { key, termNormalized, provider: outcome.provider, data: { judge: verdict }, now });
  if (verdict.isEquivalent) {
    learnEquivalentAnswer(db, termNormalized, input.userAnswer, outcome.provider, now);
  }

  return {
    isEquivalent: verdict.isEquivalent,
    reasonShort: verdict.reasonShort || 'ai semantic check',
    provider: outcome.provider,
    cached: false,
  };
}

export async function speakingFeedback(
  provider: ContentProvider,
  input: SpeakingInput
): Promise<SpeakingFeedback & { provider: string }> {
  const outcome = await withFallback('speaking feedback', provider, (p) => p.speakingFeedback(input));
  return { ...outcome.value, provider: outcome.provider };
}

// ============ Upsert with content ============

export interface UpsertWithContentResult extends UpsertCardOutcome {
  ai: { enabled: boolean; provider: string | null; aiCalled: boolean; fromCache: boolean };
  suggestions: ContentSuggestions;
}

/**
 * Save a card by term, then top up its content from the provider unless
 * `useAi` is off.
 */
export async function upsertWithContent(
  db: Database,
  provider: ContentProvider,
  input: UpsertCardRequest,
  now: Date = new Date()
): Promise<UpsertWithContentResult> {
  const outcome = upsertCard(db, input, now);

  if (input.useAi === false) {
    return {
      ...outcome,
      ai: { enabled: false, provider: null, aiCalled: false, fromCache: false },
      suggestions: buildSuggestions(outcome.card, {}),
    };
  }

  const enriched = await enrichTerm(db, provider, { term: outcome.card.term, force: input.forceAi === true }, now);
  return {
    ...outcome,
    card: enriched.card ?? outcome.card,
    ai: { enabled: true, provider: enriched.provider, aiCalled: enriched.aiCalled, fromCache: enriched.fromCache },
    suggestions: enriched.data,
  };
}
