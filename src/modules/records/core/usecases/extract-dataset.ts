/**
 * Extract Dataset Use Case
 *
 * Materializes every record of a dataset, decoded against its schema.
 */

import { assembleRecords } from '../assembler.js';
import { extractAll, type ExtractAllDeps } from './extract-all.js';

import type { TransportError } from '../errors.js';
import type { DatasetRecord, SchemaModel, SortSpec } from '../types.js';

export type ExtractDatasetDeps = ExtractAllDeps;

export interface ExtractDatasetInput {
  /** Snapshot of the dataset being extracted; its id drives the query */
  schema: SchemaModel;
  filter?: Readonly<Record<string, unknown>>;
  sorts?: readonly SortSpec[];
  pageSize?: number;
}

/**
 * Outcome of a full extraction. When `error` is set the walk stopped early
 * and `records` holds what was read before the failure; the caller decides
 * whether a partial dataset is usable.
 */
export interface ExtractDatasetResult {
  records: DatasetRecord[];
  error: TransportError | null;
}

export const extractDataset = async (
  deps: ExtractDatasetDeps,
  input: ExtractDatasetInput
): Promise<ExtractDatasetResult> => {
  const { schema, ...query } = input;
  const records: DatasetRecord[] = [];

  const source = extractAll(deps, { datasetId: schema.datasetId, ...query });

  for await (const item of assembleRecords(schema, source)) {
    if (item.isErr()) {
      return { records, error: item.error };
    }
    records.push(item.value);
  }

  return { records, error: null };
};
