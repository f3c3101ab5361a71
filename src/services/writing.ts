import type { Database, WritingError, WritingErrorInput } from '../types';
import {
  deleteWritingError as deleteWritingErrorRow,
  listWritingErrors as listWritingErrorRows,
  upsertWritingError,
  type WritingErrorQuery,
} from '../db/queries';
import { NotFoundError, ValidationError } from '../errors';
import { stableHash } from '../utils/hash';
import { optionalText } from '../utils/normalize';

// Same mistake, same correction, same category: one entry
export function writingErrorKey(input: Pick<WritingErrorInput, 'sentence' | 'correctedSentence' | 'category'>): string {
  return stableHash({
    sentence: input.sentence.trim().toLowerCase(),
    corrected: input.correctedSentence.trim().toLowerCase(),
    category: input.category,
  });
}

/**
 * Record a writing mistake. A mistake already in the bank has its count
 * bumped, and its notes and topic replaced.
 */
export function addWritingError(db: Database, input: WritingErrorInput, now: Date = new Date()): WritingError {
  const sentence = input.sentence.trim();
  const correctedSentence = input.correctedSentence.trim();
  if (!sentence || !correctedSentence) {
    throw new ValidationError('Sentence and corrected sentence are required', sentence ? 'correctedSentence' : 'sentence');
  }

  const entry = upsertWritingError(db, {
    key: writingErrorKey(input),
    sentence,
    correctedSentence,
    category: input.category,
    notes: optionalText(input.notes),
    topic: optionalText(input.topic),
    now: now.toISOString(),
  });
  if (entry.count > 1) {
    console.log(`[Writing] Repeated ${entry.category} error (count=${entry.count})`);
  }
  return entry;
}

export function listWritingErrors(
  db: Database,
  query: WritingErrorQuery
): { items: WritingError[]; total: number; page: number; limit: number } {
  const { items, total } = listWritingErrorRows(db, query);
  return { items, total, page: query.page, limit: query.limit };
}

/**
 * The most frequent mistakes, for drilling.
 */
export function getWritingDeck(db: Database, limit = 10): WritingError[] {
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ValidationError('limit must be between 1 and 100', 'limit');
  }
  return listWritingErrorRows(db, { page: 1, limit }).items;
}

export function deleteWritingError(db: Database, id: string): void {
  if (!deleteWritingErrorRow(db, id)) {
    throw new NotFoundError('Writing error not found');
  }
}
