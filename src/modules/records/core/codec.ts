/**
 * Property Codec
 *
 * Translates between the service's type-tagged property payloads and
 * canonical values.
 *
 * decodeProperty is total: a malformed payload decodes to EMPTY so one bad
 * property never aborts a bulk extraction. encodeProperty throws
 * EncodeContractError for read-only kinds; callers filter those out first.
 */

import { EncodeContractError } from './errors.js';
import {
  EMPTY,
  KIND_TO_WIRE_TYPE,
  UNKNOWN_PERSON,
  booleanValue,
  countValue,
  dateValue,
  isWritableKind,
  kindFromWireType,
  numberValue,
  optionListValue,
  optionValue,
  textListValue,
  textValue,
  type CanonicalValue,
  type FieldKind,
  type WritableKind,
} from './types.js';

type JsonObject = Readonly<Record<string, unknown>>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nameOf = (value: unknown): string | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  const name = value['name'];
  return typeof name === 'string' ? name : undefined;
};

const namesOf = (items: readonly unknown[]): string[] =>
  items.map(nameOf).filter((name): name is string => name !== undefined);

// ─────────────────────────────────────────────────────────────────────────────
// Decode
// ─────────────────────────────────────────────────────────────────────────────

const segmentText = (segment: unknown): string => {
  if (!isObject(segment)) {
    return '';
  }

  const plain = segment['plain_text'];
  if (typeof plain === 'string') {
    return plain;
  }

  // Write-shaped segments carry no plain_text
  const text = segment['text'];
  const content = isObject(text) ? text['content'] : undefined;
  return typeof content === 'string' ? content : '';
};

const decodeRichText = (payload: unknown): CanonicalValue =>
  Array.isArray(payload) ? textValue(payload.map(segmentText).join('')) : EMPTY;

const decodeNumber = (payload: unknown): CanonicalValue =>
  typeof payload === 'number' && Number.isFinite(payload) ? numberValue(payload) : EMPTY;

const decodeDate = (payload: unknown): CanonicalValue => {
  if (!isObject(payload)) {
    return EMPTY;
  }
  const start = payload['start'];
  return typeof start === 'string' ? dateValue(start) : EMPTY;
};

const decodeBoolean = (payload: unknown): CanonicalValue =>
  typeof payload === 'boolean' ? booleanValue(payload) : EMPTY;

const decodeString = (payload: unknown): CanonicalValue =>
  typeof payload === 'string' ? textValue(payload) : EMPTY;

const decodePeople = (payload: unknown): CanonicalValue => {
  if (!Array.isArray(payload)) {
    return EMPTY;
  }

  return textListValue(
    payload.map((person) => {
      const name = nameOf(person);
      return name !== undefined && name.length > 0 ? name : UNKNOWN_PERSON;
    })
  );
};

/**
 * Flattens a decoded value into display strings, used for rollup arrays.
 */
export const valueToStrings = (value: CanonicalValue): string[] => {
  switch (value.kind) {
    case 'empty':
      return [];
    case 'text':
    case 'option':
    case 'date':
      return [value.value];
    case 'number':
    case 'count':
    case 'boolean':
      return [String(value.value)];
    case 'textList':
    case 'optionList':
      return [...value.value];
  }
};

const decodeRollup = (payload: unknown): CanonicalValue => {
  if (!isObject(payload)) {
    return EMPTY;
  }

  switch (payload['type']) {
    case 'number':
      return decodeNumber(payload['number']);
    case 'date':
      return decodeDate(payload['date']);
    case 'array': {
      const items = payload['array'];
      if (!Array.isArray(items)) {
        return EMPTY;
      }
      return textListValue(items.flatMap((item) => valueToStrings(decodeProperty(item))));
    }
    default:
      return EMPTY;
  }
};

const decodeFormula = (payload: unknown): CanonicalValue => {
  if (!isObject(payload)) {
    return EMPTY;
  }

  switch (payload['type']) {
    case 'string':
      return decodeString(payload['string']);
    case 'number':
      return decodeNumber(payload['number']);
    case 'boolean':
      return decodeBoolean(payload['boolean']);
    case 'date':
      return decodeDate(payload['date']);
    default:
      return EMPTY;
  }
};

const decodeByKind = (kind: FieldKind, payload: unknown): CanonicalValue => {
  switch (kind) {
    case 'title':
    case 'text':
      return decodeRichText(payload);
    case 'number':
      return decodeNumber(payload);
    case 'select': {
      const name = nameOf(payload);
      return name !== undefined ? optionValue(name) : EMPTY;
    }
    case 'multiSelect':
      return Array.isArray(payload) ? optionListValue(namesOf(payload)) : EMPTY;
    case 'date':
      return decodeDate(payload);
    case 'checkbox':
      return decodeBoolean(payload);
    case 'url':
    case 'email':
    case 'phone':
      return decodeString(payload);
    case 'people':
      return decodePeople(payload);
    case 'files':
      return Array.isArray(payload) ? textListValue(namesOf(payload)) : EMPTY;
    case 'relation':
      // Only the number of related items is kept
      return Array.isArray(payload) ? countValue(payload.length) : EMPTY;
    case 'rollup':
      return decodeRollup(payload);
    case 'formula':
      return decodeFormula(payload);
    case 'unsupported':
      return EMPTY;
  }
};

/**
 * Decodes one raw property. The payload's own `type` tag decides the kind,
 * so a schema that changed since it was fetched cannot mislead the decoder.
 */
export const decodeProperty = (raw: unknown): CanonicalValue => {
  if (!isObject(raw)) {
    return EMPTY;
  }

  const tag = raw['type'];
  if (typeof tag !== 'string') {
    return EMPTY;
  }

  return decodeByKind(kindFromWireType(tag), raw[tag]);
};

// ─────────────────────────────────────────────────────────────────────────────
// Encode
// ─────────────────────────────────────────────────────────────────────────────

const textSegment = (content: string) => ({ type: 'text', text: { content } });

const encodePayload = (kind: WritableKind, value: CanonicalValue): unknown => {
  const mismatch = (): never => {
    throw new EncodeContractError(kind, value.kind, 'value shape does not match field kind');
  };

  switch (kind) {
    case 'title':
    case 'text':
      // No cleared shape here decodes back to EMPTY
      return value.kind === 'text' ? [textSegment(value.value)] : mismatch();
    case 'number':
      if (value.kind === 'number') {
        return Number.isFinite(value.value) ? value.value : mismatch();
      }
      return value.kind === 'empty' ? null : mismatch();
    case 'select':
      if (value.kind === 'option') {
        return { name: value.value };
      }
      return value.kind === 'empty' ? null : mismatch();
    case 'multiSelect':
      return value.kind === 'optionList' ? value.value.map((name) => ({ name })) : mismatch();
    case 'date':
      if (value.kind === 'date') {
        return { start: value.value };
      }
      return value.kind === 'empty' ? null : mismatch();
    case 'checkbox':
      return value.kind === 'boolean' ? value.value : mismatch();
    case 'url':
    case 'email':
    case 'phone':
      if (value.kind === 'text') {
        return value.value;
      }
      return value.kind === 'empty' ? null : mismatch();
  }
};

/**
 * Encodes a canonical value into the write shape of `kind`.
 *
 * @throws EncodeContractError for read-only kinds and mismatched values
 */
export const encodeProperty = (kind: FieldKind, value: CanonicalValue): Record<string, unknown> => {
  if (!isWritableKind(kind)) {
    throw new EncodeContractError(kind, value.kind, 'field is read-only');
  }

  const wireType = KIND_TO_WIRE_TYPE[kind];
  return { type: wireType, [wireType]: encodePayload(kind, value) };
};

// ─────────────────────────────────────────────────────────────────────────────
// Plain Values
// ─────────────────────────────────────────────────────────────────────────────

export type PlainValue = string | number | boolean | readonly string[] | null;

/**
 * Strips the tag for export and display consumers. EMPTY becomes null.
 */
export const toPlainValue = (value: CanonicalValue): PlainValue => {
  switch (value.kind) {
    case 'empty':
      return null;
    case 'text':
    case 'option':
    case 'date':
    case 'number':
    case 'count':
    case 'boolean':
    case 'textList':
    case 'optionList':
      return value.value;
  }
};
