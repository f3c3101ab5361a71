import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Database } from '../../types';
import { NotFoundError, ValidationError } from '../../errors';
import {
  addWritingError,
  deleteWritingError,
  getWritingDeck,
  listWritingErrors,
  writingErrorKey,
} from '../writing';
import { createTestDb } from './test-db';

const N = new Date('2026-03-10T05:00:00.000Z');
const LATER = new Date('2026-03-11T00:00:00.000Z');

describe('writing error bank', () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  const agreement = {
    sentence: 'He go to school.',
    correctedSentence: 'He goes to school.',
    category: 'grammar' as const,
  };

  it('ignores case and surrounding space in the fingerprint', () => {
    expect(
      writingErrorKey({ sentence: ' he GO to school. ', correctedSentence: 'He goes to school.', category: 'grammar' })
    ).toBe(writingErrorKey(agreement));
    expect(writingErrorKey({ ...agreement, category: 'spelling' })).not.toBe(writingErrorKey(agreement));
  });

  it('counts a repeated mistake instead of adding it again', () => {
    const first = addWritingError(db, { ...agreement, notes: 'third person', topic: 'education' }, N);
    const second = addWritingError(db, { ...agreement, sentence: 'he go to school.', notes: 'subject-verb' }, LATER);

    expect(second).toEqual({
      id: first.id,
      sentence: 'He go to school.',
      correctedSentence: 'He goes to school.',
      category: 'grammar',
      notes: 'subject-verb',
      topic: null,
      count: 2,
      createdAt: '2026-03-10T05:00:00.000Z',
      updatedAt: '2026-03-11T00:00:00.000Z',
    });
    expect(listWritingErrors(db, { page: 1, limit: 20 }).total).toBe(1);
  });

  it('rejects a blank sentence', () => {
    expect(() => addWritingError(db, { ...agreement, sentence: '  ' }, N)).toThrow(ValidationError);
  });

  describe('listing', () => {
    beforeEach(() => {
      addWritingError(db, { ...agreement, topic: 'education' }, N);
      addWritingError(db, { ...agreement, topic: 'education' }, N);
      addWritingError(
        db,
        { sentence: 'I recieved it.', correctedSentence: 'I received it.', category: 'spelling', topic: 'work' },
        N
      );
      addWritingError(
        db,
        { sentence: 'do a mistake', correctedSentence: 'make a mistake', category: 'collocation', topic: 'work' },
        LATER
      );
    });

    const sentences = (items: { sentence: string }[]) => items.map((item) => item.sentence);

    it('orders by count, then by most recent update', () => {
      expect(sentences(listWritingErrors(db, { page: 1, limit: 20 }).items)).toEqual([
        'He go to school.',
        'do a mistake',
        'I recieved it.',
      ]);
    });

    it('filters by category and topic', () => {
      expect(sentences(listWritingErrors(db, { category: 'spelling', page: 1, limit: 20 }).items)).toEqual([
        'I recieved it.',
      ]);
      const work = listWritingErrors(db, { topic: 'work', page: 1, limit: 20 });
      expect(sentences(work.items)).toEqual(['do a mistake', 'I recieved it.']);
      expect(work.total).toBe(2);
    });

    it('builds a deck of the most frequent mistakes', () => {
      expect(sentences(getWritingDeck(db, 2))).toEqual(['He go to school.', 'do a mistake']);
      expect(() => getWritingDeck(db, 101)).toThrow(ValidationError);
    });
  });

  it('deletes an entry', () => {
    const entry = addWritingError(db, agreement, N);

    deleteWritingError(db, entry.id);

    expect(listWritingErrors(db, { page: 1, limit: 20 }).items).toEqual([]);
    expect(() => deleteWritingError(db, entry.id)).toThrow(NotFoundError);
  });
});
