import { describe, it, expect, beforeEach } from 'vitest';
import type { Database } from '../../types';
import { UnsupportedVersionError } from '../../errors';
import {
  getCardById,
  getCardByTermNormalized,
  getReviewLogsForCard,
  listAllCards,
  listEvents,
  listReviewLogs,
} from '../../db/queries';
import { coerceIncomingCard, exportSnapshot, importSnapshot, mergeCards } from '../sync-merge';
import { createTestCard, createTestDb, seedCard, seedReviewLog } from './test-db';

const NOW = new Date('2026-03-12T00:00:00.000Z');

function exportedCard(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'remote-1',
    term: 'resilient',
    termNormalized: 'resilient',
    meanings: ['kiên cường'],
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
    intervalDays: 1,
    repetitions: 1,
    lapses: 0,
    dueAt: '2026-03-11T00:00:00.000Z',
    lastReviewedAt: '2026-03-10T00:00:00.000Z',
    readdCount: 0,
    lastReaddAt: null,
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-10T00:00:00.000Z',
    ...overrides,
  };
}

describe('sync merge engine', () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
  });

  describe('exportSnapshot', () => {
    it('returns every collection and records the export', () => {
      seedCard(db, { id: 'b', term: 'beta', termNormalized: 'beta', createdAt: '2026-03-02T00:00:00.000Z' });
      seedCard(db, { id: 'a', term: 'alpha', termNormalized: 'alpha', createdAt: '2026-03-03T00:00:00.000Z' });
      seedReviewLog(db, { cardId: 'a', createdAt: '2026-03-04T00:00:00.000Z' });

      const snapshot = exportSnapshot(db, NOW);

      expect(snapshot.schemaVersion).toBe('v1');
      expect(snapshot.exportedAt).toBe('2026-03-12T00:00:00.000Z');
      expect(snapshot.vocabs.map((card) => card.termNormalized)).toEqual(['alpha', 'beta']);
      expect(snapshot.review_logs).toHaveLength(1);
      expect(snapshot.events).toHaveLength(1);
      expect(snapshot.events[0].type).toBe('EXPORT');
      expect(snapshot.events[0].payload).toEqual({ schemaVersion: 'v1' });
    });

    it('imports cleanly into another store', () => {
      seedCard(db, { id: 'a', term: 'alpha', termNormalized: 'alpha' });
      seedReviewLog(db, { cardId: 'a', createdAt: '2026-03-04T00:00:00.000Z' });
      const snapshot = exportSnapshot(db, NOW);

      const other = createTestDb();
      const report = importSnapshot(other, JSON.parse(JSON.stringify(snapshot)), NOW);

      expect(report).toEqual({ addedVocabs: 1, updatedVocabs: 0, addedLogs: 1, conflicts: 0 });
    });
  });

  describe('importSnapshot', () => {
    it('rejects an unsupported schema version without writing anything', () => {
      const payload = { schemaVersion: 'v2', vocabs: [exportedCard()], review_logs: [], events: [] };

      expect(() => importSnapshot(db, payload, NOW)).toThrow(UnsupportedVersionError);
      expect(listAllCards(db)).toEqual([]);
      expect(listEvents(db)).toEqual([]);
    });

    it('rejects a payload without a schema version', () => {
      expect(() => importSnapshot(db, { vocabs: [] }, NOW)).toThrow(UnsupportedVersionError);
    });

    it('inserts unknown cards and re-points their logs at the local ids', () => {
      const payload = {
        schemaVersion: 'v1',
        vocabs: [
          exportedCard({ id: 'remote-2', term: 'Take Off', termNormalized: 'take off' }),
          exportedCard({ id: 'remote-1', term: 'abandon', termNormalized: 'abandon' }),
        ],
        review_logs: [
          { id: 'rl-1', cardId: 'remote-2', mode: 'flip', questionType: 'term_to_meaning', grade: 4, createdAt: '2026-03-10T00:00:00.000Z' },
          { id: 'rl-2', cardId: 'nowhere', mode: 'flip', questionType: 'term_to_meaning', grade: 3, createdAt: '2026-03-10T00:00:00.000Z' },
        ],
        events: [{ id: 'ev-1', type: 'RE_ADD', payload: { cardId: 'remote-2' }, createdAt: '2026-03-05T00:00:00.000Z' }],
      };

      const report = importSnapshot(db, payload, NOW);

      expect(report).toEqual({ addedVocabs: 2, updatedVocabs: 0, addedLogs: 1, conflicts: 0 });

      const takeOff = getCardByTermNormalized(db, 'take off');
      expect(takeOff?.term).toBe('Take Off');
      expect(takeOff?.id).not.toBe('remote-2');
      expect(getReviewLogsForCard(db, takeOff?.id ?? '')).toHaveLength(1);

      const events = listEvents(db);
      expect(events.map((event) => event.type)).toEqual(['RE_ADD', 'IMPORT']);
      expect(events[1].payload).toEqual({
        addedVocabs: 2,
        updatedVocabs: 0,
        addedLogs: 1,
        conflicts: 0,
        sourceSchemaVersion: 'v1',
      });
    });

    it('adds nothing when the same payload is imported twice', () => {
      const payload = {
        schemaVersion: 'v1',
        vocabs: [exportedCard({ meanings: ['kiên cường', 'bền bỉ'], tags: ['ielts'] })],
        review_logs: [
          { cardId: 'remote-1', mode: 'typing', questionType: 'meaning_to_term', grade: 2, createdAt: '2026-03-09T00:00:00.000Z' },
        ],
        events: [],
      };

      importSnapshot(db, payload, NOW);
      const second = importSnapshot(db, payload, NOW);

      expect(second).toEqual({ addedVocabs: 0, updatedVocabs: 0, addedLogs: 0, conflicts: 0 });
      expect(listAllCards(db)).toHaveLength(1);
      expect(listReviewLogs(db)).toHaveLength(1);
    });

    it('merges scheduling fields toward the less-mastered state', () => {
      seedCard(db, {
        id: 'local-1',
        term: 'resilient',
        termNormalized: 'resilient',
        repetitions: 3,
        intervalDays: 10,
        easeFactor: 2.6,
        lapses: 0,
        dueAt: '2026-03-11T00:00:00.000Z',
        lastReviewedAt: '2026-03-01T00:00:00.000Z',
        updatedAt: '2026-03-05T00:00:00.000Z',
      });

      const payload = {
        schemaVersion: 'v1',
        vocabs: [
          exportedCard({
            repetitions: 1,
            intervalDays: 2,
            easeFactor: 2.3,
            lapses: 1,
            dueAt: '2026-03-03T00:00:00.000Z',
            lastReviewedAt: '2026-03-02T00:00:00.000Z',
            updatedAt: '2026-03-04T00:00:00.000Z',
          }),
        ],
      };

      const report = importSnapshot(db, payload, NOW);
      const merged = getCardById(db, 'local-1');

      expect(report.updatedVocabs).toBe(1);
      expect(merged).toMatchObject({
        repetitions: 1,
        intervalDays: 2,
        easeFactor: 2.3,
        lapses: 1,
        dueAt: '2026-03-03T00:00:00.000Z',
        lastReviewedAt: '2026-03-02T00:00:00.000Z',
        updatedAt: '2026-03-05T00:00:00.000Z',
      });
    });

    it('counts a log already present locally only once', () => {
      seedCard(db, { id: 'local-1', term: 'resilient', termNormalized: 'resilient' });
      seedReviewLog(db, { cardId: 'local-1', grade: 4, createdAt: '2026-03-09T00:00:00.000Z' });

      const payload = {
        schemaVersion: 'v1',
        vocabs: [exportedCard({ id: 'remote-9' })],
        review_logs: [
          { cardId: 'remote-9', mode: 'flip', questionType: 'term_to_meaning', grade: 4, createdAt: '2026-03-09T00:00:00.000Z' },
          { cardId: 'remote-9', mode: 'flip', questionType: 'term_to_meaning', grade: 2, createdAt: '2026-03-09T00:00:00.000Z' },
        ],
      };

      const report = importSnapshot(db, payload, NOW);

      expect(report.addedLogs).toBe(1);
      expect(getReviewLogsForCard(db, 'local-1').map((log) => log.grade).sort()).toEqual([2, 4]);
    });

    it('resolves a log by card id when the card exists locally', () => {
      seedCard(db, { id: 'local-1', term: 'resilient', termNormalized: 'resilient' });

      const report = importSnapshot(
        db,
        {
          schemaVersion: 'v1',
          review_logs: [{ cardId: 'local-1', mode: 'mcq', questionType: 'term_to_meaning', grade: 5, createdAt: '2026-03-09T00:00:00.000Z' }],
        },
        NOW
      );

      expect(report.addedLogs).toBe(1);
      expect(getReviewLogsForCard(db, 'local-1')[0].mode).toBe('mcq');
    });

    it('counts a conflict for each differing text field when the import is newer', () => {
      seedCard(db, {
        id: 'local-1',
        term: 'resilient',
        termNormalized: 'resilient',
        meanings: ['a', 'b'],
        ipa: '/rɪˈzɪl.jənt/',
        mnemonic: 'rubber band',
        updatedAt: '2026-03-05T00:00:00.000Z',
      });

      const report = importSnapshot(
        db,
        {
          schemaVersion: 'v1',
          vocabs: [
            exportedCard({
              meanings: ['b', 'c'],
              ipa: '/rɪˈzɪliənt/',
              mnemonic: 'rubber band',
              exampleEn: 'She is resilient.',
              updatedAt: '2026-03-06T00:00:00.000Z',
            }),
          ],
        },
        NOW
      );

      const merged = getCardById(db, 'local-1');
      expect(report.conflicts).toBe(1);
      expect(merged?.ipa).toBe('/rɪˈzɪliənt/');
      expect(merged?.exampleEn).toBe('She is resilient.');
      expect(merged?.meanings).toEqual(['a', 'b', 'c']);
    });

    it('keeps local text when the import is older', () => {
      seedCard(db, {
        id: 'local-1',
        term: 'resilient',
        termNormalized: 'resilient',
        ipa: '/a/',
        updatedAt: '2026-03-05T00:00:00.000Z',
      });

      const report = importSnapshot(
        db,
        {
          schemaVersion: 'v1',
          vocabs: [exportedCard({ ipa: '/b/', exampleEn: 'Older example.', updatedAt: '2026-03-04T00:00:00.000Z' })],
        },
        NOW
      );

      const merged = getCardById(db, 'local-1');
      expect(report.conflicts).toBe(0);
      expect(merged?.ipa).toBe('/a/');
      expect(merged?.exampleEn).toBeNull();
    });

    it('skips malformed records and still returns a report', () => {
      seedCard(db, { id: 'local-1', term: 'resilient', termNormalized: 'resilient' });

      const report = importSnapshot(
        db,
        {
          schemaVersion: 'v1',
          vocabs: [
            'garbage',
            exportedCard({ id: 'blank', term: '!!!', termNormalized: '' }),
            exportedCard({ id: 'steady', term: 'steady', termNormalized: 'steady', dueAt: 'not a date', easeFactor: 9 }),
          ],
          review_logs: [
            42,
            { cardId: 'local-1', mode: 'flip', questionType: 'term_to_meaning', grade: 'abc', createdAt: '2026-03-09T00:00:00.000Z' },
          ],
          events: ['not an event'],
        },
        NOW
      );

      expect(report).toEqual({ addedVocabs: 1, updatedVocabs: 0, addedLogs: 0, conflicts: 0 });

      const steady = getCardByTermNormalized(db, 'steady');
      expect(steady?.dueAt).toBe('2026-03-12T00:00:00.000Z');
      expect(steady?.easeFactor).toBe(3.0);
      expect(listEvents(db).map((event) => event.type)).toEqual(['IMPORT']);
    });

    it('replaces an out-of-range numeric timestamp with the import time', () => {
      const report = importSnapshot(
        db,
        {
          schemaVersion: 'v1',
          vocabs: [
            exportedCard({ id: 'r1', term: 'alpha', termNormalized: 'alpha', dueAt: 1e20, lastReviewedAt: 1e20 }),
            exportedCard({ id: 'r2', term: 'beta', termNormalized: 'beta' }),
          ],
        },
        NOW
      );

      expect(report.addedVocabs).toBe(2);
      const alpha = getCardByTermNormalized(db, 'alpha');
      expect(alpha?.dueAt).toBe('2026-03-12T00:00:00.000Z');
      expect(alpha?.lastReviewedAt).toBe('2026-03-12T00:00:00.000Z');
      expect(getCardByTermNormalized(db, 'beta')?.dueAt).toBe('2026-03-11T00:00:00.000Z');
    });
  });

  describe('mergeCards', () => {
    it('takes the earliest creation and latest update', () => {
      const existing = createTestCard({
        term: 'steady',
        createdAt: '2026-03-02T00:00:00.000Z',
        updatedAt: '2026-03-04T00:00:00.000Z',
        lastReaddAt: null,
        readdCount: 0,
      });
      const incoming = coerceIncomingCard(
        exportedCard({
          term: 'steady',
          termNormalized: 'steady',
          createdAt: '2026-03-01T00:00:00.000Z',
          updatedAt: '2026-03-03T00:00:00.000Z',
          readdCount: 2,
          lastReaddAt: '2026-03-03T00:00:00.000Z',
        }),
        NOW
      );

      const { merged, conflicts } = mergeCards(existing, incoming);

      expect(conflicts).toBe(0);
      expect(merged.id).toBe(existing.id);
      expect(merged.createdAt).toBe('2026-03-01T00:00:00.000Z');
      expect(merged.updatedAt).toBe('2026-03-04T00:00:00.000Z');
      expect(merged.readdCount).toBe(2);
      expect(merged.lastReaddAt).toBe('2026-03-03T00:00:00.000Z');
    });

    it('unions word families by role', () => {
      const existing = createTestCard({ term: 'steady', wordFamily: { noun: ['steadiness'] } });
      const incoming = coerceIncomingCard(
        exportedCard({ term: 'steady', termNormalized: 'steady', wordFamily: { Noun: ['steadiness', 'steadying'], adverb: ['steadily'] } }),
        NOW
      );

      expect(mergeCards(existing, incoming).merged.wordFamily).toEqual({
        noun: ['steadiness', 'steadying'],
        adverb: ['steadily'],
      });
    });
  });
});
