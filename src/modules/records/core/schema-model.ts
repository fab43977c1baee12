/**
 * Schema Model
 *
 * Builds the immutable field snapshot of a dataset from its raw schema.
 */

import {
  UNTITLED_DATASET,
  isWritableKind,
  kindFromWireType,
  type FieldDefinition,
  type RawFieldDescriptor,
  type RawSchema,
  type SchemaModel,
} from './types.js';

const buildField = (name: string, descriptor: RawFieldDescriptor): FieldDefinition => {
  const kind = kindFromWireType(descriptor.type);
  const hasOptions = kind === 'select' || kind === 'multiSelect';

  return {
    name,
    kind,
    wireType: descriptor.type,
    // An empty list means "no options defined yet", not "unconstrained"
    options: hasOptions ? (descriptor.options ?? []).map((option) => option.name) : null,
    readOnly: !isWritableKind(kind),
  };
};

/**
 * Builds a schema snapshot. Field order follows the order in which the
 * service declared the properties; unsupported kinds are kept.
 */
export const buildSchemaModel = (raw: RawSchema): SchemaModel => {
  const title = raw.title.join('');

  return Object.freeze({
    datasetId: raw.id,
    title: title.length > 0 ? title : UNTITLED_DATASET,
    fields: Object.freeze(
      Object.entries(raw.properties).map(([name, descriptor]) => buildField(name, descriptor))
    ),
  });
};

export const getField = (schema: SchemaModel, name: string): FieldDefinition | undefined =>
  schema.fields.find((field) => field.name === name);

export const writableFields = (schema: SchemaModel): FieldDefinition[] =>
  schema.fields.filter((field) => !field.readOnly);
