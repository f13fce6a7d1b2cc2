import { describe, it, expect, vi } from 'vitest';
import { MutablePagedList, PagedResult, sortInfosToString, toPagedResult } from '../src/domain/paging/PagedList.js';

const letters = ['a', 'b', 'c', 'd', 'e'];

describe('MutablePagedList', () => {
  const fetcher = () =>
    vi.fn(async (pageNumber: number, pageSize: number): Promise<PagedResult<string>> =>
      toPagedResult(letters, pageNumber, pageSize)
    );

  it('loads the page it was created for', async () => {
    const fetch = fetcher();
    const list = new MutablePagedList(fetch, 1, 2);

    const page = await list.load();

    expect(page.items).toEqual(['a', 'b']);
    expect(fetch).toHaveBeenCalledWith(1, 2, []);
  });

  it('moves to another slice', async () => {
    const fetch = fetcher();
    const list = new MutablePagedList(fetch, 1, 2);

    const page = await list.slice(2, 2, [{ sortColumn: 'name', sortDirection: 'desc' }]).load();

    expect(page.items).toEqual(['c', 'd']);
    expect(list.position).toEqual({
      pageNumber: 2,
      pageSize: 2,
      sortInfos: [{ sortColumn: 'name', sortDirection: 'desc' }],
    });
    expect(fetch).toHaveBeenCalledWith(2, 2, [{ sortColumn: 'name', sortDirection: 'desc' }]);
  });

  it('fetches again on every load', async () => {
    const fetch = fetcher();
    const list = new MutablePagedList(fetch, 1, 5);

    await list.load();
    await list.load();

    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('rejects page positions below one', () => {
    const fetch = fetcher();

    expect(() => new MutablePagedList(fetch, 0, 10)).toThrow(RangeError);
    expect(() => new MutablePagedList(fetch, 1, 10).slice(1, 0)).toThrow('pageSize must be >= 1');
  });
});

describe('toPagedResult', () => {
  it('returns the requested window and the full count', () => {
    expect(toPagedResult(letters, 3, 2)).toEqual({ items: ['e'], pageNumber: 3, pageSize: 2, totalCount: 5 });
  });

  it('returns an empty page past the end', () => {
    expect(toPagedResult(letters, 4, 2).items).toEqual([]);
  });
});

describe('sortInfosToString', () => {
  it('renders column and direction pairs', () => {
    expect(
      sortInfosToString([
        { sortColumn: 'name', sortDirection: 'asc' },
        { sortColumn: 'code', sortDirection: 'desc' },
      ])
    ).toBe('name:asc;code:desc');
  });

  it('returns undefined when nothing is sorted', () => {
    expect(sortInfosToString([])).toBeUndefined();
  });
});
