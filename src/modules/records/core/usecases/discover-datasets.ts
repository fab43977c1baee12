/**
 * Discover Datasets Use Case
 *
 * Lists every dataset shared with the integration.
 */

import { err, ok, type Result } from 'neverthrow';

import { clampPageSize, paginate } from '../pagination.js';
import { UNTITLED_DATASET, type DatasetSummary } from '../types.js';

import type { TransportError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { Logger } from 'pino';

export interface DiscoverDatasetsDeps {
  transport: DatasetTransport;
  logger: Logger;
}

export const discoverDatasets = async (
  deps: DiscoverDatasetsDeps
): Promise<Result<DatasetSummary[], TransportError>> => {
  const log = deps.logger.child({ usecase: 'discoverDatasets' });
  const pageSize = clampPageSize();
  const datasets: DatasetSummary[] = [];

  const pages = paginate((cursor) =>
    deps.transport.searchDatasets(cursor !== undefined ? { cursor, pageSize } : { pageSize })
  );

  for await (const item of pages) {
    if (item.isErr()) {
      log.error({ err: item.error }, 'Dataset discovery failed');
      return err(item.error);
    }

    const title = item.value.title.join('');
    datasets.push({ id: item.value.id, title: title.length > 0 ? title : UNTITLED_DATASET });
  }

  log.info({ count: datasets.length }, 'Discovered datasets');
  return ok(datasets);
};
