/**
 * Load Schema Use Case
 *
 * Fetches a dataset's schema and builds the snapshot used for decoding and
 * validation. There is no cache: call again to refresh.
 */

import { buildSchemaModel } from '../schema-model.js';

import type { TransportError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { SchemaModel } from '../types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface LoadSchemaDeps {
  transport: DatasetTransport;
  logger: Logger;
}

export const loadSchema = async (
  deps: LoadSchemaDeps,
  datasetId: string
): Promise<Result<SchemaModel, TransportError>> => {
  const log = deps.logger.child({ usecase: 'loadSchema', datasetId });

  const result = (await deps.transport.fetchSchema(datasetId)).map(buildSchemaModel);

  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to fetch dataset schema');
  } else {
    log.debug({ fieldCount: result.value.fields.length }, 'Loaded dataset schema');
  }

  return result;
};
