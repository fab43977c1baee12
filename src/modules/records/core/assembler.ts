/**
 * Record Assembler
 *
 * Decodes raw records against a schema snapshot into DatasetRecords.
 */

import { decodeProperty, toPlainValue, type PlainValue } from './codec.js';
import { EMPTY, type CanonicalValue, type DatasetRecord, type RawRecord, type SchemaModel } from './types.js';

import type { Result } from 'neverthrow';

/**
 * Builds one record. Schema fields come first, in schema order, so every
 * record of a dataset has the same leading columns; properties the schema
 * does not know follow in payload order.
 */
export const assembleRecord = (schema: SchemaModel, raw: RawRecord): DatasetRecord => {
  const values = new Map<string, CanonicalValue>();

  for (const field of schema.fields) {
    values.set(
      field.name,
      Object.hasOwn(raw.properties, field.name) ? decodeProperty(raw.properties[field.name]) : EMPTY
    );
  }

  for (const [name, property] of Object.entries(raw.properties)) {
    if (!values.has(name)) {
      values.set(name, decodeProperty(property));
    }
  }

  return {
    id: raw.id,
    createdTime: raw.createdTime,
    lastEditedTime: raw.lastEditedTime,
    url: raw.url,
    values,
  };
};

/**
 * Maps an extraction stream to assembled records, passing errors through.
 */
export async function* assembleRecords<E>(
  schema: SchemaModel,
  source: AsyncIterable<Result<RawRecord, E>>
): AsyncGenerator<Result<DatasetRecord, E>, void, undefined> {
  for await (const item of source) {
    yield item.map((raw) => assembleRecord(schema, raw));
  }
}

/** System columns that precede field values in a plain row */
export const SYSTEM_COLUMNS = ['_id', '_created_time', '_last_edited_time', '_url'] as const;

export type PlainRow = Record<string, PlainValue>;

const FIELD_KEY_PREFIX = 'field:';

/**
 * Flattens a record for export consumers.
 *
 * A field whose name is already taken by a system column is written under
 * `field:<name>`, so no value is dropped.
 */
export const toPlainRow = (record: DatasetRecord): PlainRow => {
  const row: PlainRow = {
    _id: record.id,
    _created_time: record.createdTime,
    _last_edited_time: record.lastEditedTime,
    _url: record.url,
  };

  for (const [name, value] of record.values) {
    let key = name;
    while (Object.hasOwn(row, key)) {
      key = `${FIELD_KEY_PREFIX}${key}`;
    }
    row[key] = toPlainValue(value);
  }

  return row;
};
