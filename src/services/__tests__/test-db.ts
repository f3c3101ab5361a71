import type { Card, Database, ReviewLog } from '../../types';
import { openDatabase } from '../../db/schema';
import { insertCard, insertReviewLog } from '../../db/queries';

/**
 * Fresh in-memory store with the full schema applied.
 *
 * Usage:
 *   const db = createTestDb();
 *   const card = seedCard(db, { term: 'take off', termNormalized: 'take off' });
 */
export function createTestDb(): Database {
  return openDatabase(':memory:');
}

let cardCounter = 0;

export function createTestCard(overrides: Partial<Card> = {}): Card {
  cardCounter += 1;
  const term = overrides.term ?? `word-${cardCounter}`;
  return {
    id: `card-${cardCounter}`,
    term,
    termNormalized: term.toLowerCase(),
    meanings: [],
    ipa: null,
    exampleEn: null,
    exampleVi: null,
    mnemonic: null,
    tags: [],
    collocations: [],
    phrases: [],
    wordFamily: {},
    topics: [],
    cefrLevel: null,
    ieltsBand: null,
    easeFactor: 2.5,
    intervalDays: 0,
    repetitions: 0,
    lapses: 0,
    dueAt: '2026-03-01T00:00:00.000Z',
    lastReviewedAt: null,
    readdCount: 0,
    lastReaddAt: null,
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export function seedCard(db: Database, overrides: Partial<Card> = {}): Card {
  const card = createTestCard(overrides);
  const result = insertCard(db, card);
  if (result.status !== 'inserted') {
    throw new Error(`Test card "${card.termNormalized}" already exists`);
  }
  return card;
}

let logCounter = 0;

export function seedReviewLog(db: Database, overrides: Partial<ReviewLog> & { cardId: string }): ReviewLog {
  logCounter += 1;
  const log: ReviewLog = {
    id: `log-${logCounter}`,
    mode: 'flip',
    questionType: 'term_to_meaning',
    grade: 4,
    userAnswer: null,
    isNearCorrect: null,
    createdAt: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
  insertReviewLog(db, log);
  return log;
}
