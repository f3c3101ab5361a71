import { describe, it, expect, beforeEach } from 'vitest';
import type { Database } from '../../types';
import { NotFoundError, ValidationError } from '../../errors';
import { listPracticeLogs } from '../../db/queries';
import { buildClozeItem, generateCloze, submitCloze } from '../practice';
import { createTestCard, createTestDb, seedCard } from './test-db';

const NOW = new Date('2026-03-10T05:00:00.000Z');

describe('practice', () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  describe('buildClozeItem', () => {
    it('blanks the first occurrence of the term in the example', () => {
      const card = createTestCard({
        id: 'c1',
        term: 'resilient',
        meanings: ['kiên cường'],
        phrases: ['bounce back'],
        exampleEn: 'Kids are Resilient, resilient indeed.',
        ipa: '/rɪˈzɪliənt/',
      });

      expect(buildClozeItem(card)).toEqual({
        cardId: 'c1',
        term: 'resilient',
        ipa: '/rɪˈzɪliənt/',
        question: 'Kids are ____, resilient indeed.',
        hint: 'Meaning: kiên cường',
        acceptableAnswers: ['resilient', 'bounce back'],
      });
    });

    it('asks about the meaning when the example lacks the term', () => {
      const card = createTestCard({ term: 'steady', meanings: ['vững vàng'], exampleEn: 'Hold it still.' });

      expect(buildClozeItem(card)).toMatchObject({
        question: "Fill in the blank: ____ means 'vững vàng'.",
        hint: null,
      });
    });

    it('matches terms with pattern characters literally', () => {
      const card = createTestCard({ term: 'e.g.', exampleEn: 'Write eXg. or e.g. here.' });

      expect(buildClozeItem(card)?.question).toBe('Write eXg. or ____ here.');
    });

    it('leaves out the hint when the card has no meaning', () => {
      const card = createTestCard({ term: 'steady', exampleEn: 'A steady hand.' });

      expect(buildClozeItem(card)).toMatchObject({ question: 'A ____ hand.', hint: null });
    });
  });

  describe('generateCloze', () => {
    beforeEach(() => {
      seedCard(db, { id: 'c1', term: 'alpha', topics: ['travel'], dueAt: '2026-03-05T00:00:00.000Z', updatedAt: '2026-03-03T00:00:00.000Z' });
      seedCard(db, { id: 'c2', term: 'beta', dueAt: '2026-03-02T00:00:00.000Z', updatedAt: '2026-03-02T00:00:00.000Z' });
      seedCard(db, { id: 'c3', term: 'gamma', dueAt: '2026-03-08T00:00:00.000Z', updatedAt: '2026-03-04T00:00:00.000Z' });
    });

    const cardIds = (items: { cardId: string }[]) => items.map((item) => item.cardId);

    it('uses the requested cards, most recently updated first, skipping unknown ids', () => {
      expect(cardIds(generateCloze(db, { cardIds: ['c2', 'missing', 'c1'] }))).toEqual(['c1', 'c2']);
    });

    it('filters by topic', () => {
      expect(cardIds(generateCloze(db, { topic: 'travel' }))).toEqual(['c1']);
    });

    it('falls back to the earliest due cards when nothing matches', () => {
      expect(cardIds(generateCloze(db, { topic: 'business', limit: 2 }))).toEqual(['c2', 'c1']);
    });

    it('rejects a limit outside 1..30', () => {
      expect(() => generateCloze(db, { limit: 31 })).toThrow(ValidationError);
    });
  });

  describe('submitCloze', () => {
    beforeEach(() => {
      seedCard(db, { id: 'c1', term: 'resilient', phrases: ['bounce back'] });
    });

    it('accepts the term regardless of case and logs the attempt', () => {
      const result = submitCloze(db, { cardId: 'c1', userAnswer: ' Resilient ' }, NOW);

      expect(result).toEqual({ correct: true, nearCorrect: true, expected: 'resilient' });
      const logs = listPracticeLogs(db);
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        type: 'cloze_submit',
        cardId: 'c1',
        payload: { correct: true, nearCorrect: true, userAnswer: ' Resilient ' },
        createdAt: '2026-03-10T05:00:00.000Z',
      });
    });

    it('marks a misspelling as near-correct only', () => {
      // LCS 8 of 8 + 9 characters: 94.1
      expect(submitCloze(db, { cardId: 'c1', userAnswer: 'resilent' }, NOW)).toEqual({
        correct: false,
        nearCorrect: true,
        expected: 'resilient',
      });
    });

    it('accepts a phrase of the card as near-correct', () => {
      expect(submitCloze(db, { cardId: 'c1', userAnswer: 'bounce back' }, NOW)).toMatchObject({
        correct: false,
        nearCorrect: true,
      });
    });

    it('throws NotFoundError for an unknown card without logging', () => {
      expect(() => submitCloze(db, { cardId: 'missing', userAnswer: 'x' }, NOW)).toThrow(NotFoundError);
      expect(listPracticeLogs(db)).toEqual([]);
    });
  });
});
