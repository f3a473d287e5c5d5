/**
 * Paginated Fetch
 *
 * Assembles a complete result set from a source that returns at most
 * `limit` rows per call (LIMIT/OFFSET queries, range-based APIs).
 */

export type PageFetcher<T> = (offset: number, limit: number) => Promise<T[]>;

export const DEFAULT_PAGE_SIZE = 1000;

/**
 * Fetch pages from offset 0 until a page comes back short.
 *
 * @example
 * const rows = await paginatedFetch((offset, limit) =>
 *   repo.findPage(leagueId, offset, limit)
 * );
 */
export async function paginatedFetch<T>(
  fetchPage: PageFetcher<T>,
  pageSize: number = DEFAULT_PAGE_SIZE
): Promise<T[]> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const rows: T[] = [];
  let offset = 0;

  for (;;) {
    const page = await fetchPage(offset, pageSize);
    rows.push(...page);
    if (page.length < pageSize) break;
    offset += pageSize;
  }

  return rows;
}
