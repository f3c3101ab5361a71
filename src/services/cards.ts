import type {
  Card,
  CreateCardRequest,
  Database,
  ListCardsQuery,
  ReviewLog,
  ReviewResult,
  ReviewSubmission,
  UpdateCardRequest,
  UpsertCardRequest,
} from '../types';
import {
  appendEvent,
  deleteCard as deleteCardRow,
  getCardById,
  getCardByTermNormalized,
  getReviewLogsForCard,
  insertCard,
  insertReviewLog,
  listCards as listCardRows,
  replaceCard,
  updateCardSchedule,
} from '../db/queries';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { canonicalJson } from '../utils/hash';
import { generateId } from '../utils/id';
import { parseTimestamp } from '../utils/time';
import {
  mergeUniqueStrings,
  mergeWordFamily,
  normalizeTerm,
  normalizeWordFamily,
  optionalText,
  uniqueStrings,
} from '../utils/normalize';
import { applyReaddPenalty, applyReview, initialState } from './sm2';

export const NEAR_MATCH_THRESHOLD = 85;

export type CreateCardOutcome = { action: 'created' | 'readded'; card: Card };

function requireTerm(term: string): string {
  const termNormalized = normalizeTerm(term);
  if (!termNormalized) {
    throw new ValidationError('Term is empty after normalization', 'term');
  }
  return termNormalized;
}

function buildNewCard(input: CreateCardRequest, termNormalized: string, now: Date): Card {
  const timestamp = now.toISOString();
  const initial = initialState(now);
  return {
    id: generateId(),
    term: input.term.trim(),
    termNormalized,
    meanings: uniqueStrings(input.meanings),
    ipa: optionalText(input.ipa),
    exampleEn: optionalText(input.exampleEn),
    exampleVi: optionalText(input.exampleVi),
    mnemonic: optionalText(input.mnemonic),
    tags: uniqueStrings(input.tags),
    collocations: uniqueStrings(input.collocations),
    phrases: uniqueStrings(input.phrases),
    wordFamily: normalizeWordFamily(input.wordFamily),
    topics: uniqueStrings(input.topics),
    cefrLevel: input.cefrLevel ?? null,
    ieltsBand: input.ieltsBand ?? null,
    easeFactor: initial.easeFactor,
    intervalDays: initial.intervalDays,
    repetitions: initial.repetitions,
    lapses: initial.lapses,
    dueAt: initial.dueAt.toISOString(),
    lastReviewedAt: null,
    readdCount: 0,
    lastReaddAt: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Create a card, or re-add it when the normalized term already exists.
 *
 * Re-adding merges the new content into the stored card and applies the
 * re-add penalty to its schedule instead of creating a second card.
 */
export function createCard(db: Database, input: CreateCardRequest, now: Date = new Date()): CreateCardOutcome {
  const termNormalized = requireTerm(input.term);
  const card = buildNewCard(input, termNormalized, now);

  return db.transaction((): CreateCardOutcome => {
    const result = insertCard(db, card);
    if (result.status === 'inserted') {
      return { action: 'created', card: result.card };
    }
    return { action: 'readded', card: readdCard(db, result.termNormalized, input, now) };
  })();
}

function readdCard(db: Database, termNormalized: string, input: CreateCardRequest, now: Date): Card {
  const existing = getCardByTermNormalized(db, termNormalized);
  if (!existing) {
    throw new ConflictError('Duplicate term conflict', 'term');
  }

  const timestamp = now.toISOString();
  const penalty = applyReaddPenalty(existing, now);

  const updated: Card = {
    ...existing,
    meanings: mergeUniqueStrings(existing.meanings, input.meanings),
    collocations: mergeUniqueStrings(existing.collocations, input.collocations),
    phrases: mergeUniqueStrings(existing.phrases, input.phrases),
    topics: mergeUniqueStrings(existing.topics, input.topics),
    wordFamily: mergeWordFamily(existing.wordFamily, input.wordFamily),
    cefrLevel: input.cefrLevel || existing.cefrLevel,
    ieltsBand: input.ieltsBand ?? existing.ieltsBand,
    ipa: optionalText(input.ipa) ?? existing.ipa,
    easeFactor: penalty.easeFactor,
    repetitions: penalty.repetitions,
    intervalDays: penalty.intervalDays,
    dueAt: penalty.dueAt.toISOString(),
    readdCount: existing.readdCount + 1,
    lastReaddAt: timestamp,
    updatedAt: timestamp,
  };

  replaceCard(db, updated);
  appendEvent(db, 'RE_ADD', { cardId: existing.id, termNormalized }, timestamp);
  console.log(`[Cards] Re-added "${termNormalized}" (readdCount=${updated.readdCount})`);
  return updated;
}

export type UpsertCardOutcome = { action: 'created' | 'updated'; overwritten: boolean; card: Card };

const LIST_FIELDS = ['meanings', 'tags', 'collocations', 'phrases', 'topics'] as const;
const TEXT_FIELDS = ['ipa', 'exampleEn', 'exampleVi', 'mnemonic'] as const;

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}

/**
 * Create a card or update the one with the same normalized term, without
 * any re-add penalty.
 *
 * With `overwriteExisting` (the default) supplied content that differs
 * replaces the stored content; otherwise lists are merged and only empty
 * fields are filled. Scheduling fields are left alone.
 */
export function upsertCard(db: Database, input: UpsertCardRequest, now: Date = new Date()): UpsertCardOutcome {
  const termNormalized = requireTerm(input.term);
  const overwrite = input.overwriteExisting ?? true;

  return db.transaction((): UpsertCardOutcome => {
    const existing = getCardByTermNormalized(db, termNormalized);
    if (!existing) {
      const card = buildNewCard(input, termNormalized, now);
      insertCard(db, card);
      console.log(`[Cards] Created "${termNormalized}" via upsert`);
      return { action: 'created', overwritten: false, card };
    }

    const next: Card = { ...existing, term: input.term.trim() };
    let overwritten = false;

    for (const field of LIST_FIELDS) {
      const incoming = uniqueStrings(input[field]);
      if (!overwrite) {
        next[field] = mergeUniqueStrings(existing[field], incoming);
      } else if (incoming.length > 0 && !sameList(incoming, existing[field])) {
        next[field] = incoming;
        overwritten = true;
      }
    }

    const family = normalizeWordFamily(input.wordFamily);
    if (!overwrite) {
      next.wordFamily = mergeWordFamily(existing.wordFamily, family);
    } else if (Object.keys(family).length > 0 && canonicalJson(family) !== canonicalJson(existing.wordFamily)) {
      next.wordFamily = family;
      overwritten = true;
    }

    for (const field of TEXT_FIELDS) {
      const incoming = optionalText(input[field]);
      if (incoming === null || incoming === existing[field]) continue;
      if (overwrite) {
        next[field] = incoming;
        overwritten = true;
      } else if (existing[field] === null) {
        next[field] = incoming;
      }
    }

    const cefrLevel = input.cefrLevel ?? null;
    if (cefrLevel !== null && cefrLevel !== existing.cefrLevel && (overwrite || existing.cefrLevel === null)) {
      next.cefrLevel = cefrLevel;
      overwritten = overwritten || overwrite;
    }
    const ieltsBand = input.ieltsBand ?? null;
    if (ieltsBand !== null && ieltsBand !== existing.ieltsBand && (overwrite || existing.ieltsBand === null)) {
      next.ieltsBand = ieltsBand;
      overwritten = overwritten || overwrite;
    }

    if (canonicalJson(next) === canonicalJson(existing)) {
      return { action: 'updated', overwritten: false, card: existing };
    }

    next.updatedAt = now.toISOString();
    replaceCard(db, next);
    console.log(`[Cards] Updated "${termNormalized}" via upsert (overwritten=${overwritten})`);
    return { action: 'updated', overwritten, card: next };
  })();
}

export function getCard(db: Database, id: string): Card {
  const card = getCardById(db, id);
  if (!card) throw new NotFoundError('Card not found');
  return card;
}

export function listCards(
  db: Database,
  query: ListCardsQuery
): { cards: Card[]; total: number; page: number; limit: number } {
  const { cards, total } = listCardRows(db, query);
  return { cards, total, page: query.page, limit: query.limit };
}

/**
 * Apply a content patch. Scheduling fields are never touched here.
 */
export function updateCard(db: Database, id: string, patch: UpdateCardRequest, now: Date = new Date()): Card {
  return db.transaction((): Card => {
    const card = getCardById(db, id);
    if (!card) throw new NotFoundError('Card not found');

    const next: Card = { ...card, updatedAt: now.toISOString() };

    if (patch.term !== undefined) {
      const termNormalized = requireTerm(patch.term);
      const other = getCardByTermNormalized(db, termNormalized);
      if (other && other.id !== id) {
        throw new ConflictError(`Another card already uses the term "${patch.term.trim()}"`, 'term');
      }
      next.term = patch.term.trim();
      next.termNormalized = termNormalized;
    }
    if (patch.meanings !== undefined) next.meanings = uniqueStrings(patch.meanings);
    if (patch.ipa !== undefined) next.ipa = optionalText(patch.ipa);
    if (patch.exampleEn !== undefined) next.exampleEn = optionalText(patch.exampleEn);
    if (patch.exampleVi !== undefined) next.exampleVi = optionalText(patch.exampleVi);
    if (patch.mnemonic !== undefined) next.mnemonic = optionalText(patch.mnemonic);
    if (patch.tags !== undefined) next.tags = uniqueStrings(patch.tags);
    if (patch.collocations !== undefined) next.collocations = uniqueStrings(patch.collocations);
    if (patch.phrases !== undefined) next.phrases = uniqueStrings(patch.phrases);
    if (patch.wordFamily !== undefined) next.wordFamily = normalizeWordFamily(patch.wordFamily);
    if (patch.topics !== undefined) next.topics = uniqueStrings(patch.topics);
    if (patch.cefrLevel !== undefined) next.cefrLevel = patch.cefrLevel;
    if (patch.ieltsBand !== undefined) next.ieltsBand = patch.ieltsBand;

    replaceCard(db, next);
    return next;
  })();
}

/**
 * Delete a card; its review logs go with it.
 */
export function deleteCard(db: Database, id: string): void {
  if (!deleteCardRow(db, id)) {
    throw new NotFoundError('Card not found');
  }
}

export function getCardReviews(db: Database, id: string): ReviewLog[] {
  getCard(db, id);
  return getReviewLogsForCard(db, id);
}

// ============ Reviews ============

/**
 * Grade a card and persist the new schedule together with its review log.
 *
 * The schedule write is a compare-and-swap on the card's updated_at, so a
 * review graded against a stale copy of the card is rejected instead of
 * overwriting a newer grade.
 */
export function submitReview(db: Database, input: ReviewSubmission, now: Date = new Date()): ReviewResult {
  return db.transaction((): ReviewResult => {
    const card = getCardById(db, input.cardId);
    if (!card) throw new NotFoundError('Card not found');

    // Stored timestamps are canonical ISO strings; bring the client's copy to the same form
    const expectedUpdatedAt =
      input.expectedUpdatedAt === undefined
        ? card.updatedAt
        : (parseTimestamp(input.expectedUpdatedAt)?.toISOString() ?? input.expectedUpdatedAt);
    const next = applyReview(card, input.grade, now);
    const timestamp = now.toISOString();

    const userAnswer = input.userAnswer ?? null;
    let nearCorrect: boolean | null = null;
    if (input.mode === 'typing' && userAnswer !== null) {
      const candidates = input.questionType === 'meaning_to_term' ? [card.term] : card.meanings;
      nearCorrect = isNearCorrect(userAnswer, candidates);
    }

    const swapped = updateCardSchedule(db, card.id, expectedUpdatedAt, {
      easeFactor: next.easeFactor,
      intervalDays: next.intervalDays,
      repetitions: next.repetitions,
      lapses: next.lapses,
      dueAt: next.dueAt.toISOString(),
      lastReviewedAt: next.lastReviewedAt.toISOString(),
      updatedAt: timestamp,
    });
    if (!swapped) {
      throw new ConflictError('Card changed since it was loaded; reload and review again', 'cardId');
    }

    insertReviewLog(db, {
      id: generateId(),
      cardId: card.id,
      mode: input.mode,
      questionType: input.questionType,
      grade: input.grade,
      userAnswer,
      isNearCorrect: nearCorrect,
      createdAt: timestamp,
    });

    const updated = getCard(db, card.id);
    return {
      card: updated,
      nextDueAt: updated.dueAt,
      intervalDays: updated.intervalDays,
      easeFactor: updated.easeFactor,
      repetitions: updated.repetitions,
      lapses: updated.lapses,
    };
  })();
}

// ============ Typing answers ============

function lcsLength(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Indel similarity on a 0..100 scale.
 */
export function similarityRatio(a: string, b: string): number {
  if (a.length + b.length === 0) return 100;
  return (200 * lcsLength(a, b)) / (a.length + b.length);
}

/**
 * Best similarity of the shorter string against every same-length window
 * of the longer one.
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    best = Math.max(best, similarityRatio(shorter, longer.slice(start, start + shorter.length)));
    if (best === 100) break;
  }
  return best;
}

/**
 * Whether a typed answer is close enough to one of the accepted answers.
 * Exact after normalization, else the best full or partial similarity
 * must reach `threshold`.
 */
export function isNearCorrect(answer: string, candidates: string[], threshold: number = NEAR_MATCH_THRESHOLD): boolean {
  const normalizedAnswer = normalizeTerm(answer);
  if (!normalizedAnswer) return false;

  const normalizedCandidates = candidates.map((candidate) => normalizeTerm(candidate)).filter(Boolean);
  if (normalizedCandidates.length === 0) return false;
  if (normalizedCandidates.includes(normalizedAnswer)) return true;

  const score = Math.max(
    ...normalizedCandidates.map((candidate) =>
      Math.max(similarityRatio(normalizedAnswer, candidate), partialRatio(normalizedAnswer, candidate))
    )
  );
  return score >= threshold;
}
