/**
 * Create Record Use Case
 *
 * Validates user input against the schema snapshot, creates the record and
 * returns it as the service stored it.
 */

import { err, ok, type Result } from 'neverthrow';

import { assembleRecord } from '../assembler.js';
import { buildWriteProperties, type FieldInputs } from '../write-request.js';

import type { RecordsError } from '../errors.js';
import type { DatasetTransport } from '../ports.js';
import type { DatasetRecord, SchemaModel } from '../types.js';
import type { Logger } from 'pino';

export interface CreateRecordDeps {
  transport: DatasetTransport;
  logger: Logger;
}

export interface CreateRecordInput {
  schema: SchemaModel;
  /** Raw text per field name; blank entries are left unset */
  inputs: FieldInputs;
}

export const createRecord = async (
  deps: CreateRecordDeps,
  input: CreateRecordInput
): Promise<Result<DatasetRecord, RecordsError>> => {
  const { schema, inputs } = input;
  const log = deps.logger.child({ usecase: 'createRecord', datasetId: schema.datasetId });

  const request = buildWriteProperties(schema, inputs);
  if (request.isErr()) {
    log.debug({ err: request.error }, 'Create request rejected');
    return err(request.error);
  }

  const created = await deps.transport.createRecord(schema.datasetId, request.value.properties);
  if (created.isErr()) {
    log.error({ err: created.error }, 'Failed to create record');
    return err(created.error);
  }

  log.info(
    { recordId: created.value.id, fields: [...request.value.values.keys()] },
    'Created record'
  );

  return ok(assembleRecord(schema, created.value));
};
