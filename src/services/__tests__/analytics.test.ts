import { describe, it, expect, beforeEach } from 'vitest';
import type { Database } from '../../types';
import { ValidationError } from '../../errors';
import { getOverview, getTopicStats } from '../analytics';
import { createTestDb, seedCard, seedReviewLog } from './test-db';

const NOW = new Date('2026-03-10T05:00:00.000Z');

describe('analytics', () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it('reports zeros for an empty store', () => {
    expect(getOverview(db, 30, NOW)).toEqual({
      days: 30,
      totalVocabs: 0,
      dueNow: 0,
      reviewedCount: 0,
      avgGrade: 0,
      accuracyRate: 0,
      typingAccuracy: 0,
    });
    expect(getTopicStats(db, 30, NOW)).toEqual([]);
  });

  it('rejects a window outside 1..365 days', () => {
    expect(() => getOverview(db, 0, NOW)).toThrow(ValidationError);
    expect(() => getTopicStats(db, 366, NOW)).toThrow(ValidationError);
  });

  describe('with reviews', () => {
    beforeEach(() => {
      seedCard(db, { id: 'c1', topics: ['work', 'travel'], dueAt: '2026-03-01T00:00:00.000Z' });
      seedCard(db, { id: 'c2', topics: ['travel'], dueAt: '2026-03-20T00:00:00.000Z' });
      seedCard(db, { id: 'c3', dueAt: '2026-03-10T05:00:00.000Z' });

      seedReviewLog(db, { cardId: 'c1', grade: 4, mode: 'flip', createdAt: '2026-03-05T00:00:00.000Z' });
      seedReviewLog(db, { cardId: 'c1', grade: 2, mode: 'typing', createdAt: '2026-03-06T00:00:00.000Z' });
      seedReviewLog(db, { cardId: 'c2', grade: 5, mode: 'typing', createdAt: '2026-03-07T00:00:00.000Z' });
      seedReviewLog(db, { cardId: 'c3', grade: 3, mode: 'mcq', createdAt: '2026-03-08T00:00:00.000Z' });
      // Outside a 7-day window
      seedReviewLog(db, { cardId: 'c2', grade: 0, mode: 'typing', createdAt: '2026-03-01T00:00:00.000Z' });
    });

    it('summarizes reviews inside the window', () => {
      expect(getOverview(db, 7, NOW)).toEqual({
        days: 7,
        totalVocabs: 3,
        dueNow: 2,
        reviewedCount: 4,
        avgGrade: 3.5,
        accuracyRate: 0.75,
        typingAccuracy: 0.5,
      });
    });

    it('counts every review toward each topic of its card', () => {
      expect(getTopicStats(db, 7, NOW)).toEqual([
        { topic: 'travel', vocabCount: 2, reviewedCount: 3, avgGrade: 3.67 },
        { topic: 'work', vocabCount: 1, reviewedCount: 2, avgGrade: 3 },
      ]);
    });

    it('widens with the window', () => {
      expect(getOverview(db, 30, NOW)).toMatchObject({ reviewedCount: 5, avgGrade: 2.8, typingAccuracy: 0.33 });
    });
  });
});
