/**
 * Query Records Use Case
 *
 * Runs a single filtered/sorted query and returns one page of decoded
 * records, for lookups that do not need the whole dataset.
 */

import { assembleRecord } from '../assembler.js';
import { clampPageSize } from '../pagination.js';

import type { TransportError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { DatasetRecord, SchemaModel, SortSpec } from '../types.js';
import type { Result } from 'neverthrow';

export interface QueryRecordsDeps {
  transport: DatasetTransport;
}

export interface QueryRecordsInput {
  schema: SchemaModel;
  filter?: Readonly<Record<string, unknown>>;
  sorts?: readonly SortSpec[];
  /** Maximum records returned; capped at MAX_PAGE_SIZE */
  limit?: number;
}

export const queryRecords = async (
  deps: QueryRecordsDeps,
  input: QueryRecordsInput
): Promise<Result<DatasetRecord[], TransportError>> => {
  const { schema, filter, sorts, limit } = input;

  const page = await deps.transport.query(schema.datasetId, {
    pageSize: clampPageSize(limit),
    ...(filter !== undefined && { filter }),
    ...(sorts !== undefined && { sorts }),
  });

  return page.map(({ items }) => items.map((raw) => assembleRecord(schema, raw)));
};
