/**
 * Cursor Pagination
 *
 * A lazy walk over a cursor-paginated endpoint. Pages are fetched only when
 * the consumer pulls past the end of the current one, so breaking out of the
 * loop stops the walk. Each call starts a fresh walk.
 */

import { err, ok, type Result } from 'neverthrow';

import { MAX_PAGE_SIZE, type Page } from './types.js';

/**
 * Clamps a requested page size to 1..MAX_PAGE_SIZE; undefined means the maximum.
 */
export const clampPageSize = (size?: number): number =>
  Math.max(1, Math.min(Math.floor(size ?? MAX_PAGE_SIZE), MAX_PAGE_SIZE));

export type FetchPage<T, E> = (cursor: string | undefined) => Promise<Result<Page<T>, E>>;

/**
 * Yields every item of every page in page order.
 *
 * A failed page yields a single err and ends the walk; items of earlier
 * pages have already been yielded and stay valid.
 */
export async function* paginate<T, E>(
  fetchPage: FetchPage<T, E>
): AsyncGenerator<Result<T, E>, void, undefined> {
  let cursor: string | undefined;

  for (;;) {
    const page = await fetchPage(cursor);
    if (page.isErr()) {
      yield err(page.error);
      return;
    }

    for (const item of page.value.items) {
      yield ok(item);
    }

    const { hasMore, nextCursor } = page.value;
    if (!hasMore || nextCursor === null) {
      return;
    }
    cursor = nextCursor;
  }
}
