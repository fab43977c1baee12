/**
 * Extract All Use Case
 *
 * Walks every page of a dataset query, in order, and yields the raw records.
 */

import { clampPageSize, paginate } from '../pagination.js';

import type { TransportError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { QueryOptions, RawRecord, SortSpec } from '../types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ExtractAllDeps {
  transport: DatasetTransport;
  logger: Logger;
}

export interface ExtractAllInput {
  datasetId: string;
  filter?: Readonly<Record<string, unknown>>;
  sorts?: readonly SortSpec[];
  /** Records per query, capped at MAX_PAGE_SIZE */
  pageSize?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lazily yields every record of a dataset.
 *
 * The sequence is finite and cannot be resumed: each call starts from the
 * first page. If page N fails, records of pages 1..N-1 have been yielded and
 * the final item is the error.
 */
export async function* extractAll(
  deps: ExtractAllDeps,
  input: ExtractAllInput
): AsyncGenerator<Result<RawRecord, TransportError>, void, undefined> {
  const { transport } = deps;
  const { datasetId } = input;
  const log = deps.logger.child({ usecase: 'extractAll', datasetId });

  const pageSize = clampPageSize(input.pageSize);
  let pageCount = 0;
  let recordCount = 0;

  log.info({ pageSize }, 'Starting dataset extraction');

  const pages = paginate(async (cursor) => {
    const options: QueryOptions = {
      pageSize,
      ...(cursor !== undefined && { cursor }),
      ...(input.filter !== undefined && { filter: input.filter }),
      ...(input.sorts !== undefined && { sorts: input.sorts }),
    };

    pageCount += 1;
    const page = await transport.query(datasetId, options);
    if (page.isOk()) {
      log.debug(
        { page: pageCount, size: page.value.items.length, hasMore: page.value.hasMore },
        'Fetched page'
      );
    }
    return page;
  });

  for await (const item of pages) {
    if (item.isErr()) {
      log.error({ err: item.error, failedPage: pageCount, recordCount }, 'Dataset extraction aborted');
      yield item;
      return;
    }

    recordCount += 1;
    yield item;
  }

  log.info({ pageCount, recordCount }, 'Finished dataset extraction');
}
