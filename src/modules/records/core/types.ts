/**
 * Records Module - Domain Types
 *
 * Field kinds, schema snapshots, canonical values and the raw shapes that
 * cross the transport port.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Largest page the query endpoint will return */
export const MAX_PAGE_SIZE = 100;

/** Display name used for a person reference without a resolvable name */
export const UNKNOWN_PERSON = 'Unknown person';

/** Title used for datasets that have none */
export const UNTITLED_DATASET = 'Untitled';

// ─────────────────────────────────────────────────────────────────────────────
// Field Kinds
// ─────────────────────────────────────────────────────────────────────────────

export const FIELD_KINDS = [
  'title',
  'text',
  'number',
  'select',
  'multiSelect',
  'date',
  'checkbox',
  'url',
  'email',
  'phone',
  'people',
  'files',
  'relation',
  'rollup',
  'formula',
  'unsupported',
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

/** Kinds the service accepts in create/update requests */
export type WritableKind = Extract<
  FieldKind,
  'title' | 'text' | 'number' | 'select' | 'multiSelect' | 'date' | 'checkbox' | 'url' | 'email' | 'phone'
>;

export type ReadOnlyKind = Exclude<FieldKind, WritableKind>;

/**
 * Maps the wire `type` tag of a property to its field kind.
 * Tags missing from this table are `unsupported`.
 */
export const WIRE_TYPE_TO_KIND: Readonly<Record<string, Exclude<FieldKind, 'unsupported'>>> = {
  title: 'title',
  rich_text: 'text',
  number: 'number',
  select: 'select',
  multi_select: 'multiSelect',
  date: 'date',
  checkbox: 'checkbox',
  url: 'url',
  email: 'email',
  phone_number: 'phone',
  people: 'people',
  files: 'files',
  relation: 'relation',
  rollup: 'rollup',
  formula: 'formula',
};

export const KIND_TO_WIRE_TYPE: Readonly<Record<WritableKind, string>> = {
  title: 'title',
  text: 'rich_text',
  number: 'number',
  select: 'select',
  multiSelect: 'multi_select',
  date: 'date',
  checkbox: 'checkbox',
  url: 'url',
  email: 'email',
  phone: 'phone_number',
};

export const kindFromWireType = (wireType: string): FieldKind =>
  Object.hasOwn(WIRE_TYPE_TO_KIND, wireType) ? (WIRE_TYPE_TO_KIND[wireType] ?? 'unsupported') : 'unsupported';

export const isWritableKind = (kind: FieldKind): kind is WritableKind => {
  switch (kind) {
    case 'title':
    case 'text':
    case 'number':
    case 'select':
    case 'multiSelect':
    case 'date':
    case 'checkbox':
    case 'url':
    case 'email':
    case 'phone':
      return true;
    case 'people':
    case 'files':
    case 'relation':
    case 'rollup':
    case 'formula':
    case 'unsupported':
      return false;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Schema Model
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldDefinition {
  /** Unique within the dataset */
  readonly name: string;
  readonly kind: FieldKind;
  /** Wire tag as declared by the service, kept for unsupported kinds */
  readonly wireType: string;
  /** Permitted labels for select/multi-select, in declared order; null for other kinds */
  readonly options: readonly string[] | null;
  readonly readOnly: boolean;
}

/**
 * Immutable snapshot of a dataset's schema.
 * Rebuild it from a fresh fetch when the remote schema changes.
 */
export interface SchemaModel {
  readonly datasetId: string;
  readonly title: string;
  readonly fields: readonly FieldDefinition[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Canonical Values
// ─────────────────────────────────────────────────────────────────────────────

export interface EmptyValue {
  readonly kind: 'empty';
}

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface TextListValue {
  readonly kind: 'textList';
  readonly value: readonly string[];
}

export interface OptionValue {
  readonly kind: 'option';
  readonly value: string;
}

export interface OptionListValue {
  readonly kind: 'optionList';
  readonly value: readonly string[];
}

export interface DateValue {
  readonly kind: 'date';
  /** ISO-8601 start date or date-time */
  readonly value: string;
}

export interface CountValue {
  readonly kind: 'count';
  readonly value: number;
}

export type CanonicalValue =
  | EmptyValue
  | TextValue
  | NumberValue
  | BooleanValue
  | TextListValue
  | OptionValue
  | OptionListValue
  | DateValue
  | CountValue;

export const EMPTY: EmptyValue = Object.freeze({ kind: 'empty' });

export const textValue = (value: string): TextValue => ({ kind: 'text', value });
export const numberValue = (value: number): NumberValue => ({ kind: 'number', value });
export const booleanValue = (value: boolean): BooleanValue => ({ kind: 'boolean', value });
export const textListValue = (value: readonly string[]): TextListValue => ({
  kind: 'textList',
  value,
});
export const optionValue = (value: string): OptionValue => ({ kind: 'option', value });
export const optionListValue = (value: readonly string[]): OptionListValue => ({
  kind: 'optionList',
  value,
});
export const dateValue = (value: string): DateValue => ({ kind: 'date', value });
export const countValue = (value: number): CountValue => ({ kind: 'count', value });

/**
 * Validator outcome meaning "leave this field as it is".
 * Distinct from EMPTY, which clears a field.
 */
export interface NoChange {
  readonly kind: 'noChange';
}

export const NO_CHANGE: NoChange = Object.freeze({ kind: 'noChange' });

export const isNoChange = (value: CanonicalValue | NoChange): value is NoChange =>
  value.kind === 'noChange';

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export interface DatasetRecord {
  /** Assigned by the service, stable */
  readonly id: string;
  readonly createdTime: string;
  readonly lastEditedTime: string;
  readonly url: string;
  /** Field name to value, schema field order first */
  readonly values: ReadonlyMap<string, CanonicalValue>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Raw Shapes (transport port)
// ─────────────────────────────────────────────────────────────────────────────

/** Raw property payloads keyed by field name, as sent or received on the wire */
export type RawPropertyMap = Readonly<Record<string, unknown>>;

export interface RawRecord {
  readonly id: string;
  readonly createdTime: string;
  readonly lastEditedTime: string;
  readonly url: string;
  readonly properties: RawPropertyMap;
}

export interface RawFieldDescriptor {
  readonly type: string;
  /** Present on select/multi-select descriptors */
  readonly options?: readonly { readonly name: string }[];
}

export interface RawSchema {
  readonly id: string;
  /** Plain text of each title segment */
  readonly title: readonly string[];
  readonly properties: Readonly<Record<string, RawFieldDescriptor>>;
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly nextCursor: string | null;
  readonly hasMore: boolean;
}

export type RawQueryPage = Page<RawRecord>;

export interface RawDatasetSummary {
  readonly id: string;
  readonly title: readonly string[];
}

export type RawDatasetPage = Page<RawDatasetSummary>;

export interface SortSpec {
  readonly property?: string;
  readonly timestamp?: 'created_time' | 'last_edited_time';
  readonly direction: 'ascending' | 'descending';
}

export interface QueryOptions {
  readonly cursor?: string;
  /** Service filter object, passed through untouched */
  readonly filter?: Readonly<Record<string, unknown>>;
  readonly sorts?: readonly SortSpec[];
  readonly pageSize?: number;
}

export interface SearchOptions {
  readonly cursor?: string;
  readonly pageSize?: number;
}

export interface DatasetSummary {
  readonly id: string;
  readonly title: string;
}
