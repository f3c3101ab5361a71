import { z } from 'zod';
import type {
  AuditEvent,
  Card,
  Database,
  ReviewLog,
  SyncImportReport,
  SyncSnapshot,
} from '../types';
import { QUESTION_TYPES, REVIEW_MODES } from '../types';
import {
  appendEvent,
  appendEvents,
  getCardById,
  getCardByTermNormalized,
  insertCard,
  insertReviewLogs,
  listAllCards,
  listEvents,
  listReviewLogs,
  replaceCard,
} from '../db/queries';
import { IntegrityError, UnsupportedVersionError, ValidationError } from '../errors';
import { stableHash } from '../utils/hash';
import { generateId } from '../utils/id';
import {
  isRecord,
  mergeUniqueStrings,
  mergeWordFamily,
  normalizeTerm,
  normalizeWordFamily,
  optionalText,
  toCefrLevel,
  uniqueStrings,
} from '../utils/normalize';
import { parseTimestamp } from '../utils/time';
import { clamp, MAXIMUM_EASE, MINIMUM_EASE, STARTING_EASE } from './sm2';

export const SCHEMA_VERSION = 'v1';

const TEXT_FIELDS = ['term', 'ipa', 'exampleEn', 'exampleVi', 'mnemonic'] as const;

const importEnvelopeSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  vocabs: z.array(z.unknown()).nullish(),
  review_logs: z.array(z.unknown()).nullish(),
  events: z.array(z.unknown()).nullish(),
});

/** Incoming card after field-by-field coercion; `sourceId` is its id on the exporting side. */
export interface IncomingCard extends Omit<Card, 'id'> {
  sourceId: string;
}

interface IncomingLog {
  sourceCardId: string;
  mode: ReviewLog['mode'];
  questionType: ReviewLog['questionType'];
  grade: number;
  userAnswer: string | null;
  isNearCorrect: boolean | null;
  createdAt: string;
}

// ============ Export ============

/**
 * Produce a full snapshot of the store. The EXPORT event is written first
 * so the snapshot carries it.
 */
export function exportSnapshot(db: Database, now: Date = new Date()): SyncSnapshot {
  const exportedAt = now.toISOString();

  return db.transaction((): SyncSnapshot => {
    appendEvent(db, 'EXPORT', { schemaVersion: SCHEMA_VERSION }, exportedAt);
    return {
      schemaVersion: SCHEMA_VERSION,
      exportedAt,
      vocabs: listAllCards(db),
      review_logs: listReviewLogs(db),
      events: listEvents(db),
    };
  })();
}

// ============ Coercion ============

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toCount(value: unknown): number {
  const parsed = toNumber(value);
  return parsed === null ? 0 : Math.max(0, Math.trunc(parsed));
}

function timestampOr(value: unknown, fallback: Date): string {
  return (parseTimestamp(value) ?? fallback).toISOString();
}

function optionalTimestamp(value: unknown, fallback: Date): string | null {
  if (value === null || value === undefined || value === '') return null;
  return timestampOr(value, fallback);
}

/**
 * Coerce one exported card. Unusable timestamps become `now`; numeric
 * fields fall back to their initial values; ease is clamped.
 */
export function coerceIncomingCard(raw: unknown, now: Date): IncomingCard {
  if (!isRecord(raw)) {
    throw new IntegrityError('Card record is not an object');
  }

  const termNormalized = normalizeTerm(optionalText(raw.termNormalized) ?? optionalText(raw.term) ?? '');
  const ieltsBand = toNumber(raw.ieltsBand);

  return {
    sourceId: optionalText(raw.id) ?? optionalText(raw._id) ?? '',
    term: optionalText(raw.term) ?? termNormalized,
    termNormalized,
    meanings: uniqueStrings(raw.meanings),
    ipa: optionalText(raw.ipa),
    exampleEn: optionalText(raw.exampleEn),
    exampleVi: optionalText(raw.exampleVi),
    mnemonic: optionalText(raw.mnemonic),
    tags: uniqueStrings(raw.tags),
    collocations: uniqueStrings(raw.collocations),
    phrases: uniqueStrings(raw.phrases),
    wordFamily: normalizeWordFamily(raw.wordFamily),
    topics: uniqueStrings(raw.topics),
    cefrLevel: toCefrLevel(raw.cefrLevel),
    ieltsBand,
    easeFactor: clamp(toNumber(raw.easeFactor) ?? STARTING_EASE, MINIMUM_EASE, MAXIMUM_EASE),
    intervalDays: toCount(raw.intervalDays),
    repetitions: toCount(raw.repetitions),
    lapses: toCount(raw.lapses),
    dueAt: timestampOr(raw.dueAt, now),
    lastReviewedAt: optionalTimestamp(raw.lastReviewedAt, now),
    readdCount: toCount(raw.readdCount),
    lastReaddAt: optionalTimestamp(raw.lastReaddAt, now),
    createdAt: timestampOr(raw.createdAt, now),
    updatedAt: timestampOr(raw.updatedAt, now),
  };
}

function coerceIncomingLog(raw: unknown, now: Date): IncomingLog {
  if (!isRecord(raw)) {
    throw new IntegrityError('Review log is not an object');
  }

  const grade = toNumber(raw.grade ?? 0);
  if (grade === null || !Number.isInteger(grade) || grade < 0 || grade > 5) {
    throw new IntegrityError('Review log grade is unusable', 'grade');
  }

  return {
    sourceCardId: optionalText(raw.cardId) ?? optionalText(raw.vocabId) ?? '',
    mode: REVIEW_MODES.find((mode) => mode === raw.mode) ?? 'flip',
    questionType: QUESTION_TYPES.find((type) => type === raw.questionType) ?? 'term_to_meaning',
    grade,
    userAnswer: typeof raw.userAnswer === 'string' ? raw.userAnswer : null,
    isNearCorrect: typeof raw.isNearCorrect === 'boolean' ? raw.isNearCorrect : null,
    createdAt: timestampOr(raw.createdAt, now),
  };
}

function coerceIncomingEvent(raw: unknown, now: Date): AuditEvent {
  if (!isRecord(raw)) {
    throw new IntegrityError('Event is not an object');
  }
  return {
    id: generateId(),
    type: optionalText(raw.type) ?? 'IMPORT',
    payload: isRecord(raw.payload) ? raw.payload : {},
    createdAt: timestampOr(raw.createdAt, now),
  };
}

// ============ Card merge ============

function earlier(left: string, right: string): string {
  return Date.parse(left) <= Date.parse(right) ? left : right;
}

function later(left: string, right: string): string {
  return Date.parse(left) >= Date.parse(right) ? left : right;
}

function laterOptional(left: string | null, right: string | null): string | null {
  if (left === null) return right;
  if (right === null) return left;
  return later(left, right);
}

/**
 * Merge an incoming card into the local one with the same normalized term.
 *
 * Lists are unioned. Text fields follow the side updated last, counting a
 * conflict for each field both sides filled differently. Scheduling fields
 * move toward the less-mastered of the two states.
 */
export function mergeCards(existing: Card, incoming: IncomingCard): { merged: Card; conflicts: number } {
  const merged: Card = {
    ...existing,
    meanings: mergeUniqueStrings(existing.meanings, incoming.meanings),
    tags: mergeUniqueStrings(existing.tags, incoming.tags),
    collocations: mergeUniqueStrings(existing.collocations, incoming.collocations),
    phrases: mergeUniqueStrings(existing.phrases, incoming.phrases),
    topics: mergeUniqueStrings(existing.topics, incoming.topics),
    wordFamily: mergeWordFamily(existing.wordFamily, incoming.wordFamily),
    cefrLevel: incoming.cefrLevel ?? existing.cefrLevel,
    ieltsBand: incoming.ieltsBand ?? existing.ieltsBand,
    createdAt: earlier(existing.createdAt, incoming.createdAt),
    updatedAt: later(existing.updatedAt, incoming.updatedAt),
    repetitions: Math.min(existing.repetitions, incoming.repetitions),
    intervalDays: Math.min(existing.intervalDays, incoming.intervalDays),
    easeFactor: Math.min(existing.easeFactor, incoming.easeFactor),
    dueAt: earlier(existing.dueAt, incoming.dueAt),
    lapses: Math.max(existing.lapses, incoming.lapses),
    readdCount: Math.max(existing.readdCount, incoming.readdCount),
    lastReviewedAt: laterOptional(existing.lastReviewedAt, incoming.lastReviewedAt),
    lastReaddAt: laterOptional(existing.lastReaddAt, incoming.lastReaddAt),
  };

  let conflicts = 0;
  if (Date.parse(incoming.updatedAt) >= Date.parse(existing.updatedAt)) {
    for (const field of TEXT_FIELDS) {
      const local = existing[field];
      const remote = incoming[field];
      if (local && remote && local !== remote) {
        conflicts += 1;
      }
      if (remote) {
        merged[field] = remote;
      }
    }
  }

  return { merged, conflicts };
}

function logFingerprint(log: {
  cardId: string;
  createdAt: string;
  grade: number;
  mode: string;
  questionType: string;
}): string {
  return stableHash({
    cardId: log.cardId,
    createdAt: log.createdAt,
    grade: log.grade,
    mode: log.mode,
    questionType: log.questionType,
  });
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

// ============ Import ============

/**
 * Merge an exported snapshot into the store.
 *
 * Cards match on normalized term, logs are re-pointed at the local cards
 * and deduplicated by fingerprint, and events are appended. Everything runs
 * in one transaction; lookups read the current store, so re-running the
 * same import adds nothing. Malformed records are skipped one at a time.
 */
export function importSnapshot(db: Database, payload: unknown, now: Date = new Date()): SyncImportReport {
  if (!isRecord(payload)) {
    throw new ValidationError('Import payload must be a JSON object');
  }
  if (payload.schemaVersion !== SCHEMA_VERSION) {
    throw new UnsupportedVersionError(payload.schemaVersion);
  }

  const parsed = importEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError('Malformed import payload', undefined, parsed.error.issues);
  }
  const envelope = parsed.data;
  const timestamp = now.toISOString();

  const run = db.transaction((): SyncImportReport => {
    const report: SyncImportReport = { addedVocabs: 0, updatedVocabs: 0, addedLogs: 0, conflicts: 0 };
    const localIds = new Map<string, string>();

    // Cards
    const incomingCards: IncomingCard[] = [];
    for (const raw of envelope.vocabs ?? []) {
      try {
        incomingCards.push(coerceIncomingCard(raw, now));
      } catch (err) {
        if (!(err instanceof IntegrityError)) throw err;
        console.warn(`[Sync Import] Skipping card: ${err.message}`);
      }
    }
    incomingCards.sort(byKey((card) => card.termNormalized));

    for (const incoming of incomingCards) {
      if (!incoming.termNormalized) continue;

      const existing = getCardByTermNormalized(db, incoming.termNormalized);
      if (!existing) {
        const { sourceId, ...fields } = incoming;
        const result = insertCard(db, { id: generateId(), ...fields });
        if (result.status !== 'inserted') {
          throw new Error(`Card "${incoming.termNormalized}" appeared during import`);
        }
        if (sourceId) localIds.set(sourceId, result.card.id);
        report.addedVocabs += 1;
        continue;
      }

      if (incoming.sourceId) localIds.set(incoming.sourceId, existing.id);

      const { merged, conflicts } = mergeCards(existing, incoming);
      report.conflicts += conflicts;
      if (stableHash(merged) !== stableHash(existing)) {
        replaceCard(db, merged);
        report.updatedVocabs += 1;
      }
    }

    // Review logs
    const fingerprints = new Set(listReviewLogs(db).map(logFingerprint));
    const incomingLogs: IncomingLog[] = [];
    for (const raw of envelope.review_logs ?? []) {
      try {
        incomingLogs.push(coerceIncomingLog(raw, now));
      } catch (err) {
        if (!(err instanceof IntegrityError)) throw err;
        console.warn(`[Sync Import] Skipping review log: ${err.message}`);
      }
    }
    incomingLogs.sort(byKey((log) => log.createdAt));

    const accepted: ReviewLog[] = [];
    for (const incoming of incomingLogs) {
      const { sourceCardId, ...fields } = incoming;
      const cardId =
        localIds.get(sourceCardId) ??
        (sourceCardId && getCardById(db, sourceCardId) ? sourceCardId : undefined);
      if (!cardId) continue;

      const log: ReviewLog = { id: generateId(), cardId, ...fields };
      const fingerprint = logFingerprint(log);
      if (fingerprints.has(fingerprint)) continue;
      fingerprints.add(fingerprint);
      accepted.push(log);
    }
    report.addedLogs = accepted.length > 0 ? insertReviewLogs(db, accepted) : 0;

    // Events
    const events: AuditEvent[] = [];
    for (const raw of envelope.events ?? []) {
      try {
        events.push(coerceIncomingEvent(raw, now));
      } catch (err) {
        if (!(err instanceof IntegrityError)) throw err;
        console.warn(`[Sync Import] Skipping event: ${err.message}`);
      }
    }
    if (events.length > 0) appendEvents(db, events);

    appendEvent(db, 'IMPORT', { ...report, sourceSchemaVersion: envelope.schemaVersion }, timestamp);
    return report;
  });

  const report = run();
  console.log(
    `[Sync Import] added=${report.addedVocabs} updated=${report.updatedVocabs} logs=${report.addedLogs} conflicts=${report.conflicts}`
  );
  return report;
}
