import type { SortInfo } from '../catalog/models.js';

export interface PagedResult<T> {
  items: T[];
  pageNumber: number;
  pageSize: number;
  totalCount: number;
}

export type PageFetcher<T> = (
  pageNumber: number,
  pageSize: number,
  sortInfos: SortInfo[]
) => Promise<PagedResult<T>>;

/**
 * On-demand view over a paged query. Holds only the fetch closure and the
 * current position; every load() re-issues the query.
 */
export class MutablePagedList<T> {
  private sortInfos: SortInfo[] = [];

  constructor(
    private readonly fetch: PageFetcher<T>,
    private pageNumber: number,
    private pageSize: number
  ) {
    if (pageNumber < 1) throw new RangeError('pageNumber must be >= 1');
    if (pageSize < 1) throw new RangeError('pageSize must be >= 1');
  }

  get position(): { pageNumber: number; pageSize: number; sortInfos: SortInfo[] } {
    return { pageNumber: this.pageNumber, pageSize: this.pageSize, sortInfos: [...this.sortInfos] };
  }

  slice(pageNumber: number, pageSize: number, sortInfos: SortInfo[] = []): this {
    if (pageNumber < 1) throw new RangeError('pageNumber must be >= 1');
    if (pageSize < 1) throw new RangeError('pageSize must be >= 1');
    this.pageNumber = pageNumber;
    this.pageSize = pageSize;
    this.sortInfos = [...sortInfos];
    return this;
  }

  load(): Promise<PagedResult<T>> {
    return this.fetch(this.pageNumber, this.pageSize, [...this.sortInfos]);
  }
}

export function toPagedResult<T>(superset: T[], pageNumber: number, pageSize: number): PagedResult<T> {
  const start = (pageNumber - 1) * pageSize;
  return {
    items: superset.slice(start, start + pageSize),
    pageNumber,
    pageSize,
    totalCount: superset.length,
  };
}

export function sortInfosToString(sortInfos: SortInfo[]): string | undefined {
  if (sortInfos.length === 0) return undefined;
  return sortInfos.map((s) => `${s.sortColumn}:${s.sortDirection}`).join(';');
}
