/**
 * Update Record Use Case
 *
 * Applies validated field changes to an existing record. The record passed
 * in is left untouched; the result is a new record built from the service's
 * response, which replaces it.
 */

import { err, ok, type Result } from 'neverthrow';

import { assembleRecord } from '../assembler.js';
import { buildWriteProperties, type FieldInputs } from '../write-request.js';

import type { RecordsError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { DatasetRecord, SchemaModel } from '../types.js';
import type { Logger } from 'pino';

export interface UpdateRecordDeps {
  transport: DatasetTransport;
  logger: Logger;
}

export interface UpdateRecordInput {
  schema: SchemaModel;
  record: DatasetRecord;
  /** Raw text per field name; blank entries keep the current value */
  inputs: FieldInputs;
}

export const updateRecord = async (
  deps: UpdateRecordDeps,
  input: UpdateRecordInput
): Promise<Result<DatasetRecord, RecordsError>> => {
  const { schema, record, inputs } = input;
  const log = deps.logger.child({ usecase: 'updateRecord', recordId: record.id });

  const request = buildWriteProperties(schema, inputs);
  if (request.isErr()) {
    log.debug({ err: request.error }, 'Update request rejected');
    return err(request.error);
  }

  const updated = await deps.transport.updateRecord(record.id, request.value.properties);
  if (updated.isErr()) {
    log.error({ err: updated.error }, 'Failed to update record');
    return err(updated.error);
  }

  log.info({ fields: [...request.value.values.keys()] }, 'Updated record');

  return ok(assembleRecord(schema, updated.value));
};
