/**
 * Tests for name resolution and selection cleaning
 */

import { describe, it, expect, vi } from 'vitest';
import {
  type Disambiguator,
  chooseKey,
  cleanSelection,
  resolveName,
} from '../src/resolver/index.js';

function picker(index: number): Disambiguator {
  return { pick: vi.fn(async () => index) };
}

describe('resolveName', () => {
  it('should resolve an exact key without fuzzy matching', () => {
    const matcher = vi.fn(() => ['Other']);
    const keys = new Set(['CreateFile', 'CloseHandle']);

    expect(resolveName('CreateFile', keys, { matcher })).toEqual({ kind: 'exact', key: 'CreateFile' });
    expect(matcher).not.toHaveBeenCalled();
  });

  it('should be case-sensitive', () => {
    const keys = new Set(['CreateFile']);
    expect(resolveName('createfile', keys).kind).not.toBe('exact');
  });

  it('should correct a single close match', () => {
    const keys = new Set(['CreateFile', 'CloseHandle', 'VirtualAlloc']);
    expect(resolveName('CretaeFile', keys)).toEqual({ kind: 'fuzzy', key: 'CreateFile' });
  });

  it('should return several close matches best first', () => {
    const keys = new Set(['ReadFile', 'ReadFileEx', 'WriteFile', 'CloseHandle']);
    expect(resolveName('ReadFil', keys)).toEqual({
      kind: 'ambiguous',
      candidates: ['ReadFile', 'ReadFileEx'],
    });
  });

  it('should report when nothing is close', () => {
    const keys = new Set(['ReadFile', 'ReadFileEx', 'WriteFile', 'CloseHandle']);
    expect(resolveName('Zzzqqq', keys)).toEqual({ kind: 'not-found' });
  });

  it('should pass matching options to the matcher', () => {
    const matcher = vi.fn(() => []);
    const keys = new Set(['ReadFile']);

    resolveName('ReadFil', keys, { matcher, limit: 5, cutoff: 0.8 });

    expect(matcher).toHaveBeenCalledWith('ReadFil', keys, { limit: 5, cutoff: 0.8 });
  });

  it('should honor the limit', () => {
    const keys = new Set(['ReadFile', 'ReadFileEx', 'WriteFile', 'CloseHandle']);
    expect(resolveName('ReadFil', keys, { limit: 1 })).toEqual({ kind: 'fuzzy', key: 'ReadFile' });
  });
});

describe('chooseKey', () => {
  it('should return exact and fuzzy keys without asking', async () => {
    const disambiguator = picker(0);

    expect(await chooseKey({ kind: 'exact', key: 'ReadFile' }, disambiguator)).toBe('ReadFile');
    expect(await chooseKey({ kind: 'fuzzy', key: 'ReadFile' }, disambiguator)).toBe('ReadFile');
    expect(disambiguator.pick).not.toHaveBeenCalled();
  });

  it('should return null when nothing matched', async () => {
    expect(await chooseKey({ kind: 'not-found' }, picker(0))).toBeNull();
  });

  it('should ask the disambiguator for ambiguous results', async () => {
    const resolution = { kind: 'ambiguous' as const, candidates: ['ReadFile', 'ReadFileEx'] };
    const disambiguator = picker(1);

    expect(await chooseKey(resolution, disambiguator)).toBe('ReadFileEx');
    expect(disambiguator.pick).toHaveBeenCalledWith(['ReadFile', 'ReadFileEx']);
  });

  it('should treat a cancelled or out-of-range choice as no match', async () => {
    const resolution = { kind: 'ambiguous' as const, candidates: ['ReadFile', 'ReadFileEx'] };

    expect(await chooseKey(resolution, picker(-1))).toBeNull();
    expect(await chooseKey(resolution, picker(2))).toBeNull();
  });
});

describe('cleanSelection', () => {
  it.each([
    ['CreateFile', 'CreateFile'],
    ['__imp_CreateFile', 'CreateFile'],
    ['cs:CloseHandle', 'CloseHandle'],
    ['ds:__imp_CloseHandle', '__imp_CloseHandle'],
    ['j_CreateFile(hFile)', 'CreateFile'],
    ['ReadFile(h, buf, n, &read, 0)', 'ReadFile'],
  ])('should clean %s to %s', (raw, expected) => {
    expect(cleanSelection(raw)).toBe(expected);
  });

  it('should reject selections with no name left', () => {
    for (const raw of ['', 'cs:', '(x)', null, undefined]) {
      expect(cleanSelection(raw)).toBeNull();
    }
  });

  it('should accept custom prefixes', () => {
    expect(cleanSelection('sub_CreateFile', [{ prefix: 'sub_', kind: 'test' }])).toBe('CreateFile');
    expect(cleanSelection('j_CreateFile', [])).toBe('j_CreateFile');
  });
});
