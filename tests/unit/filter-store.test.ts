import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FilterableThread, ThreadFilter } from '../../src/types/filter';
import {
  applyFilters,
  FilterStore,
  matchesFilter,
  stripHtml,
} from '../../src/main/services/filter-store';

function filter(overrides: Partial<ThreadFilter>): ThreadFilter {
  return {
    id: 0,
    keyword: '',
    scope: 'subject',
    caseSensitive: false,
    isRegex: false,
    enabled: true,
    ...overrides,
  };
}

describe('stripHtml', () => {
  it('turns line breaks into spaces and drops tags', () => {
    expect(stripHtml('first<br>second<br/>third<br />end')).toBe('first second third end');
    expect(stripHtml('<span class="quote">&gt;quoted</span> text')).toBe('&gt;quoted text');
  });
});

describe('matchesFilter', () => {
  it('matches subjects case-insensitively by default', () => {
    const f = filter({ keyword: 'GENERAL' });
    expect(matchesFilter(f, { sub: 'Desktop general thread' })).toBe(true);
    expect(matchesFilter(f, { com: 'general' })).toBe(false);
  });

  it('respects caseSensitive', () => {
    const f = filter({ keyword: 'General', caseSensitive: true });
    expect(matchesFilter(f, { sub: 'General' })).toBe(true);
    expect(matchesFilter(f, { sub: 'general' })).toBe(false);
  });

  it('treats the keyword as a literal unless isRegex is set', () => {
    const literal = filter({ keyword: '^test' });
    const regex = filter({ keyword: '^test', isRegex: true });
    expect(matchesFilter(literal, { sub: 'testing' })).toBe(false);
    expect(matchesFilter(literal, { sub: 'a ^test b' })).toBe(true);
    expect(matchesFilter(regex, { sub: 'Testing' })).toBe(true);
    expect(matchesFilter(regex, { sub: 'a test' })).toBe(false);
  });

  it('matches comments after stripping markup', () => {
    const f = filter({ keyword: 'hello world', scope: 'comment' });
    expect(matchesFilter(f, { com: 'hello<br>world' })).toBe(true);
    expect(matchesFilter(f, { sub: 'hello world' })).toBe(false);
  });

  it('checks subject and comment with scope both', () => {
    const f = filter({ keyword: 'spam', scope: 'both' });
    expect(matchesFilter(f, { sub: 'spam' })).toBe(true);
    expect(matchesFilter(f, { com: '<b>spam</b>' })).toBe(true);
    expect(matchesFilter(f, { sub: 'ham', com: 'eggs' })).toBe(false);
  });

  it('never matches with a disabled filter or an empty keyword', () => {
    expect(matchesFilter(filter({ keyword: 'x', enabled: false }), { sub: 'x' })).toBe(false);
    expect(matchesFilter(filter({ keyword: '' }), { sub: 'anything' })).toBe(false);
  });

  it('treats an invalid regex as non-matching', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const f = filter({ id: 4, keyword: '([', isRegex: true });
    expect(matchesFilter(f, { sub: '([' })).toBe(false);
    expect(warn).toHaveBeenCalledWith('[filters] WARN: Invalid regex pattern in filter 4: ([');
  });
});

describe('applyFilters', () => {
  it('hides matched threads and keeps order', () => {
    const threads = [
      { no: 1, sub: 'keep one' },
      { no: 2, sub: 'drop me' },
      { no: 3, com: 'keep three' },
    ];
    const result = applyFilters(threads, [filter({ keyword: 'drop' })]);
    expect(result.map((t) => t.no)).toEqual([1, 3]);
  });

  it('returns every thread when there are no filters', () => {
    const threads: (FilterableThread & { no: number })[] = [{ no: 1 }, { no: 2 }];
    expect(applyFilters(threads, [])).toEqual(threads);
  });
});

describe('FilterStore', () => {
  let dir: string;
  let filePath: string;
  let store: FilterStore;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'filter-store-'));
    filePath = join(dir, 'filters.json');
    store = new FilterStore(filePath);
    await store.load();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty without a file', () => {
    expect(store.getBoardFilters('g')).toEqual([]);
    expect(store.getAllFilters()).toEqual({});
  });

  it('assigns ids per board with defaults', async () => {
    const first = await store.addFilter('g', { keyword: 'alpha' });
    const second = await store.addFilter('g', { keyword: 'beta', scope: 'both', isRegex: true });
    const other = await store.addFilter('v', { keyword: 'gamma' });

    expect(first).toEqual({
      id: 0,
      keyword: 'alpha',
      scope: 'subject',
      caseSensitive: false,
      isRegex: false,
      enabled: true,
    });
    expect(second.id).toBe(1);
    expect(second.scope).toBe('both');
    expect(other.id).toBe(0);
  });

  it('never reuses an id after removal, across reloads', async () => {
    await store.addFilter('g', { keyword: 'a' });
    await store.addFilter('g', { keyword: 'b' });
    expect(await store.removeFilter('g', 1)).toBe(true);
    const third = await store.addFilter('g', { keyword: 'c' });
    expect(third.id).toBe(2);

    const reloaded = new FilterStore(filePath);
    await reloaded.load();
    expect(reloaded.getBoardFilters('g').map((f) => [f.id, f.keyword])).toEqual([
      [0, 'a'],
      [2, 'c'],
    ]);
    expect((await reloaded.addFilter('g', { keyword: 'd' })).id).toBe(3);
  });

  it('removeFilter reports unknown ids', async () => {
    await store.addFilter('g', { keyword: 'a' });
    expect(await store.removeFilter('g', 9)).toBe(false);
    expect(await store.removeFilter('x', 0)).toBe(false);
  });

  it('updates only the given fields', async () => {
    await store.addFilter('g', { keyword: 'a' });

    expect(await store.updateFilter('g', 0, { enabled: false, keyword: 'b' })).toBe(true);
    expect(store.getBoardFilters('g')).toEqual([
      { id: 0, keyword: 'b', scope: 'subject', caseSensitive: false, isRegex: false, enabled: false },
    ]);
    expect(await store.updateFilter('g', 5, { enabled: true })).toBe(false);
  });

  it('clears a board but keeps its counter', async () => {
    await store.addFilter('g', { keyword: 'a' });
    await store.addFilter('g', { keyword: 'b' });

    expect(await store.clearBoardFilters('g')).toBe(true);
    expect(await store.clearBoardFilters('g')).toBe(false);
    expect(store.getBoardFilters('g')).toEqual([]);
    expect((await store.addFilter('g', { keyword: 'c' })).id).toBe(2);
  });

  it('imports filters and moves counters past the highest id', async () => {
    await store.addFilter('v', { keyword: 'old' });
    await store.importFilters({
      g: [filter({ id: 7, keyword: 'imported' })],
    });

    expect(store.getAllFilters()).toEqual({ g: [filter({ id: 7, keyword: 'imported' })] });
    expect((await store.addFilter('g', { keyword: 'next' })).id).toBe(8);
    expect((await store.addFilter('v', { keyword: 'again' })).id).toBe(1);
  });

  it('writes a versioned file', async () => {
    await store.addFilter('g', { keyword: 'a' });
    const saved: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    expect(saved).toEqual({
      version: 1,
      boards: { g: [filter({ id: 0, keyword: 'a' })] },
      nextIds: { g: 1 },
    });
  });

  it('starts empty when the file is corrupt', async () => {
    writeFileSync(filePath, '{not json');
    const reloaded = new FilterStore(filePath);
    await reloaded.load();
    expect(reloaded.getAllFilters()).toEqual({});
  });

  it('repairs a counter that lags behind stored ids', async () => {
    writeFileSync(
      filePath,
      JSON.stringify({ version: 1, boards: { g: [filter({ id: 4, keyword: 'x' })] }, nextIds: {} }),
    );
    const reloaded = new FilterStore(filePath);
    await reloaded.load();
    expect((await reloaded.addFilter('g', { keyword: 'y' })).id).toBe(5);
  });
});
