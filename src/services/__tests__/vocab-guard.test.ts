import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Database } from '../../types';
import { StubContentProvider } from '../ai';
import { validateTypedEntry } from '../vocab-guard';
import { createFakeProvider } from './fake-provider';
import { createTestDb } from './test-db';

const NOW = new Date('2026-03-10T05:00:00.000Z');

describe('validateTypedEntry', () => {
  let db: Database;

  beforeEach(() => {
    db = createTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('skips entries that were not typed by hand', async () => {
    const provider = createFakeProvider();

    const check = await validateTypedEntry(db, provider, { term: 'h3llo', inputMethod: 'pasted' }, NOW);

    expect(check).toEqual({ checked: false, accepted: true, provider: 'skipped', fromCache: false, result: null });
    expect(provider.validateEntry).not.toHaveBeenCalled();
  });

  it('rejects a typed term containing digits', async () => {
    const check = await validateTypedEntry(
      db,
      new StubContentProvider(),
      { term: ' H3llo ', meanings: ['xin chào'], inputMethod: 'typed' },
      NOW
    );

    expect(check.accepted).toBe(false);
    expect(check.provider).toBe('stub');
    expect(check.result).toEqual({
      isTermValid: false,
      isMeaningPlausible: true,
      suggestedTerm: 'h3llo',
      suggestedMeanings: ['xin chào'],
      reasonShort: 'stub lexical check',
    });
  });

  it('rejects a term that normalizes to nothing without asking the provider', async () => {
    const provider = createFakeProvider();

    const check = await validateTypedEntry(db, provider, { term: '!!', inputMethod: 'typed' }, NOW);

    expect(check.accepted).toBe(false);
    expect(check.provider).toBe('local');
    expect(provider.validateEntry).not.toHaveBeenCalled();
  });

  it('caches the verdict per term and meaning set', async () => {
    const provider = createFakeProvider();
    const input = { term: 'resilient', meanings: ['kiên cường', 'Kiên cường'], inputMethod: 'typed' as const };

    const first = await validateTypedEntry(db, provider, input, NOW);
    const second = await validateTypedEntry(db, provider, input, NOW);

    expect(provider.validateEntry).toHaveBeenCalledTimes(1);
    expect(provider.validateEntry).toHaveBeenCalledWith({ term: 'resilient', meanings: ['kiên cường'] });
    expect(first).toMatchObject({ checked: true, accepted: true, provider: 'fake', fromCache: false });
    expect(second).toMatchObject({ checked: true, accepted: true, provider: 'fake', fromCache: true });
  });

  it('falls back to the stub when the provider fails', async () => {
    const provider = createFakeProvider();
    provider.validateEntry.mockRejectedValue(new Error('upstream timeout'));

    const check = await validateTypedEntry(db, provider, { term: 'resilient', inputMethod: 'typed' }, NOW);

    expect(check.accepted).toBe(true);
    expect(check.provider).toBe('stub');
  });
});
