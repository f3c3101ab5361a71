import { describe, it, expect, beforeEach } from 'vitest';
import type { ContentBundle, Database } from '../../types';
import { cacheKey, getCache, mergeContent, upsertCache } from '../ai-cache';
import { createTestDb } from './test-db';

describe('AI content cache', () => {
  describe('cacheKey', () => {
    it('joins operation, version and term', () => {
      expect(cacheKey('enrich', 'take off')).toBe('enrich:v1:take off');
    });

    it('appends the content hash when given', () => {
      expect(cacheKey('judge', 'take off', 'abc123')).toBe('judge:v1:take off:abc123');
    });
  });

  describe('mergeContent', () => {
    it('collapses structurally identical examples', () => {
      const existing: ContentBundle = { examples: [{ en: 'Planes take off.', vi: 'Máy bay cất cánh.' }] };
      const incoming: ContentBundle = {
        examples: [
          { vi: 'Máy bay cất cánh.', en: 'Planes take off.' },
          { en: 'Sales took off.', vi: 'Doanh số tăng vọt.' },
        ],
      };

      expect(mergeContent(existing, incoming).examples).toEqual([
        { en: 'Planes take off.', vi: 'Máy bay cất cánh.' },
        { en: 'Sales took off.', vi: 'Doanh số tăng vọt.' },
      ]);
    });

    it('unions string lists in order', () => {
      const merged = mergeContent(
        { mnemonics: ['m1'], distractors: ['land'] },
        { mnemonics: ['m2', 'm1'], meaningVariants: ['cất cánh'] }
      );

      expect(merged).toEqual({
        mnemonics: ['m1', 'm2'],
        distractors: ['land'],
        meaningVariants: ['cất cánh'],
      });
    });

    it('dedupes synonym groups as whole groups', () => {
      const merged = mergeContent(
        { synonymGroups: [['rise', 'climb']] },
        { synonymGroups: [['rise', 'climb'], ['climb', 'rise']] }
      );
      expect(merged.synonymGroups).toEqual([['rise', 'climb'], ['climb', 'rise']]);
    });

    it('replaces judge outright', () => {
      const merged = mergeContent(
        { judge: { isEquivalent: false, reasonShort: 'old' } },
        { judge: { isEquivalent: true, reasonShort: 'new' } }
      );
      expect(merged.judge).toEqual({ isEquivalent: true, reasonShort: 'new' });
    });

    it('only replaces ipa with a non-blank value', () => {
      expect(mergeContent({ ipa: '/teɪk/' }, { ipa: '   ' }).ipa).toBe('/teɪk/');
      expect(mergeContent({ ipa: '/teɪk/' }, { ipa: null }).ipa).toBe('/teɪk/');
      expect(mergeContent({ ipa: '/teɪk/' }, { ipa: ' /teɪk ɒf/ ' }).ipa).toBe('/teɪk ɒf/');
    });

    it('leaves lists absent from the incoming bundle alone', () => {
      const existing: ContentBundle = { examples: [{ en: 'a', vi: 'b' }] };
      expect(mergeContent(existing, {})).toEqual(existing);
    });
  });

  describe('store', () => {
    let db: Database;

    beforeEach(() => {
      db = createTestDb();
    });

    it('returns null for an unknown key', () => {
      expect(getCache(db, 'enrich:v1:nothing')).toBeNull();
    });

    it('keeps createdAt across updates', () => {
      const key = cacheKey('enrich', 'take off');
      upsertCache(db, {
        key,
        termNormalized: 'take off',
        provider: 'stub',
        data: { mnemonics: ['m1'] },
        now: new Date('2026-03-01T00:00:00.000Z'),
      });
      const updated = upsertCache(db, {
        key,
        termNormalized: 'take off',
        provider: 'anthropic',
        data: { mnemonics: ['m1', 'm2'] },
        now: new Date('2026-03-02T00:00:00.000Z'),
      });

      expect(updated).toEqual({
        key,
        termNormalized: 'take off',
        version: 'v1',
        provider: 'anthropic',
        data: { mnemonics: ['m1', 'm2'] },
        createdAt: '2026-03-01T00:00:00.000Z',
        updatedAt: '2026-03-02T00:00:00.000Z',
      });
    });
  });
});
