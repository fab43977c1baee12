/**
 * Records Module - Public API
 *
 * Property codec, input validation and paginated extraction for datasets
 * stored in a hosted document database.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  FieldKind,
  WritableKind,
  ReadOnlyKind,
  FieldDefinition,
  SchemaModel,
  CanonicalValue,
  EmptyValue,
  TextValue,
  NumberValue,
  BooleanValue,
  TextListValue,
  OptionValue,
  OptionListValue,
  DateValue,
  CountValue,
  NoChange,
  DatasetRecord,
  DatasetSummary,
  RawPropertyMap,
  RawRecord,
  RawSchema,
  RawFieldDescriptor,
  RawQueryPage,
  RawDatasetPage,
  RawDatasetSummary,
  Page,
  QueryOptions,
  SearchOptions,
  SortSpec,
} from './core/types.js';

export {
  // Constants
  MAX_PAGE_SIZE,
  UNKNOWN_PERSON,
  UNTITLED_DATASET,
  FIELD_KINDS,
  EMPTY,
  NO_CHANGE,
  // Value constructors
  textValue,
  numberValue,
  booleanValue,
  textListValue,
  optionValue,
  optionListValue,
  dateValue,
  countValue,
  // Type guards
  isNoChange,
  isWritableKind,
  kindFromWireType,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RecordsError,
  TransportError,
  NetworkError,
  AuthenticationError,
  NotFoundError,
  ApiError,
  InvalidResponseError,
  Rejection,
  RejectionType,
  FieldRejection,
  WriteError,
  WriteValidationError,
  NothingToWriteError,
} from './core/errors.js';

export {
  EncodeContractError,
  REJECTIONS,
  formatRejection,
  createNetworkError,
  createAuthenticationError,
  createNotFoundError,
  createApiError,
  createInvalidResponseError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { DatasetTransport } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { buildSchemaModel, getField, writableFields } from './core/schema-model.js';
export {
  decodeProperty,
  encodeProperty,
  toPlainValue,
  valueToStrings,
  type PlainValue,
} from './core/codec.js';
export { validateInput, type ValidationResult } from './core/validator.js';
export { paginate, clampPageSize, type FetchPage } from './core/pagination.js';
export {
  assembleRecord,
  assembleRecords,
  toPlainRow,
  SYSTEM_COLUMNS,
  type PlainRow,
} from './core/assembler.js';
export {
  buildWriteProperties,
  type FieldInputs,
  type WriteProperties,
} from './core/write-request.js';
export { extractDatasetIdFromUrl, formatDatasetId } from './core/dataset-id.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { loadSchema, type LoadSchemaDeps } from './core/usecases/load-schema.js';
export {
  extractAll,
  type ExtractAllDeps,
  type ExtractAllInput,
} from './core/usecases/extract-all.js';
export {
  extractDataset,
  type ExtractDatasetDeps,
  type ExtractDatasetInput,
  type ExtractDatasetResult,
} from './core/usecases/extract-dataset.js';
export {
  queryRecords,
  type QueryRecordsDeps,
  type QueryRecordsInput,
} from './core/usecases/query-records.js';
export {
  createRecord,
  type CreateRecordDeps,
  type CreateRecordInput,
} from './core/usecases/create-record.js';
export {
  updateRecord,
  type UpdateRecordDeps,
  type UpdateRecordInput,
} from './core/usecases/update-record.js';
export {
  discoverDatasets,
  type DiscoverDatasetsDeps,
} from './core/usecases/discover-datasets.js';
export {
  summarizeDataset,
  type DatasetSummaryReport,
} from './core/usecases/summarize-dataset.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  createNotionTransport,
  type NotionTransportOptions,
} from './shell/client/notion-transport.js';
