/**
 * Write Request Builder
 *
 * Validates textual field inputs against a schema snapshot and encodes the
 * accepted values into the property map of a create/update request.
 */

import { err, ok, type Result } from 'neverthrow';

import { encodeProperty } from './codec.js';
import {
  REJECTIONS,
  createNothingToWriteError,
  createWriteValidationError,
  type FieldRejection,
  type WriteError,
} from './errors.js';
import { getField } from './schema-model.js';
import { isNoChange, type CanonicalValue, type SchemaModel } from './types.js';
import { validateInput } from './validator.js';

/** Raw text per field name, as typed by a user */
export type FieldInputs = Readonly<Record<string, string>>;

export interface WriteProperties {
  /** Encoded payloads keyed by field name */
  readonly properties: Record<string, unknown>;
  /** The canonical values that were encoded, in input order */
  readonly values: ReadonlyMap<string, CanonicalValue>;
}

/**
 * Validates every input and encodes the accepted ones.
 *
 * Blank inputs are skipped. Inputs for unknown or read-only fields are
 * rejected, and all rejections are reported together so the caller can
 * re-prompt for every bad field at once.
 */
export const buildWriteProperties = (
  schema: SchemaModel,
  inputs: FieldInputs
): Result<WriteProperties, WriteError> => {
  const rejections: FieldRejection[] = [];
  const properties: Record<string, unknown> = {};
  const values = new Map<string, CanonicalValue>();

  for (const [name, input] of Object.entries(inputs)) {
    const field = getField(schema, name);
    if (field === undefined) {
      rejections.push({ field: name, rejection: REJECTIONS.unknownField() });
      continue;
    }

    const validated = validateInput(input, field.kind, field.options);
    if (validated.isErr()) {
      rejections.push({ field: name, rejection: validated.error });
      continue;
    }

    const value = validated.value;
    if (isNoChange(value)) {
      continue;
    }

    properties[name] = encodeProperty(field.kind, value);
    values.set(name, value);
  }

  if (rejections.length > 0) {
    return err(createWriteValidationError(rejections));
  }

  if (values.size === 0) {
    return err(createNothingToWriteError());
  }

  return ok({ properties, values });
};
