/**
 * Records Module - Port Interfaces
 *
 * Defines the transport contract that the shell layer must implement.
 */

import type { TransportError } from './errors.js';
import type {
  QueryOptions,
  RawDatasetPage,
  RawPropertyMap,
  RawQueryPage,
  RawRecord,
  RawSchema,
  SearchOptions,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Dataset Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Authenticated access to the document-database service.
 * Implementations must tolerate concurrent calls from independent walks.
 */
export interface DatasetTransport {
  /**
   * Retrieves the schema of a dataset.
   */
  fetchSchema(datasetId: string): Promise<Result<RawSchema, TransportError>>;

  /**
   * Retrieves one page of records.
   * The cursor must come from a previous page of the same dataset.
   */
  query(datasetId: string, options?: QueryOptions): Promise<Result<RawQueryPage, TransportError>>;

  /**
   * Creates a record and returns it as stored by the service.
   */
  createRecord(
    datasetId: string,
    properties: RawPropertyMap
  ): Promise<Result<RawRecord, TransportError>>;

  /**
   * Updates the given properties of a record and returns the stored result.
   */
  updateRecord(
    recordId: string,
    properties: RawPropertyMap
  ): Promise<Result<RawRecord, TransportError>>;

  /**
   * Lists one page of datasets visible to the integration.
   */
  searchDatasets(options?: SearchOptions): Promise<Result<RawDatasetPage, TransportError>>;
}
