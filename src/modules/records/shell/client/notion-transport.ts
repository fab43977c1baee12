/**
 * Notion Transport
 *
 * DatasetTransport over the service's JSON/HTTP API, using the global fetch.
 * Response bodies are checked against TypeBox schemas before they reach the
 * core; HTTP failures are mapped to TransportError values.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  DatabaseResponseSchema,
  ErrorResponseSchema,
  PageResponseSchema,
  QueryResponseSchema,
  SearchResponseSchema,
  type DatabaseResponse,
  type PageResponse,
} from './schemas.js';
import {
  formatSchemaErrors,
  createApiError,
  createAuthenticationError,
  createInvalidResponseError,
  createNetworkError,
  createNotFoundError,
  type TransportError,
} from '../../core/errors.js';
import { describeError } from '../../../../common/types/errors.js';

import type { DatasetTransport } from '../../core/ports.js';
import type {
  QueryOptions,
  RawFieldDescriptor,
  RawPropertyMap,
  RawRecord,
  RawSchema,
  SearchOptions,
} from '../../core/types.js';
import type { Static, TSchema } from '@sinclair/typebox';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface NotionTransportOptions {
  /** Integration token */
  token: string;
  /** API origin, e.g. https://api.notion.com */
  baseUrl: string;
  /** Value of the Notion-Version header */
  notionVersion: string;
  /** Per-request timeout */
  timeoutMs: number;
  logger: Logger;
  /** Injected in tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH';

interface RequestSpec {
  method: HttpMethod;
  path: string;
  body?: unknown;
  /** Resource named in NotFoundError */
  resource: string;
  id: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Validators
// ─────────────────────────────────────────────────────────────────────────────

const databaseValidator = TypeCompiler.Compile(DatabaseResponseSchema);
const pageValidator = TypeCompiler.Compile(PageResponseSchema);
const queryValidator = TypeCompiler.Compile(QueryResponseSchema);
const searchValidator = TypeCompiler.Compile(SearchResponseSchema);
const errorValidator = TypeCompiler.Compile(ErrorResponseSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Mapping
// ─────────────────────────────────────────────────────────────────────────────

const toRawRecord = (page: PageResponse): RawRecord => ({
  id: page.id,
  createdTime: page.created_time,
  lastEditedTime: page.last_edited_time,
  url: page.url,
  properties: page.properties,
});

const toRawSchema = (database: DatabaseResponse): RawSchema => {
  const properties: Record<string, RawFieldDescriptor> = {};

  for (const [name, descriptor] of Object.entries(database.properties)) {
    const options = descriptor.select?.options ?? descriptor.multi_select?.options;
    properties[name] = {
      type: descriptor.type,
      ...(options !== undefined && { options }),
    };
  }

  return {
    id: database.id,
    title: (database.title ?? []).map((segment) => segment.plain_text),
    properties,
  };
};

const parseBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
};

const toHttpError = (status: number, body: unknown, spec: RequestSpec): TransportError => {
  const details = errorValidator.Check(body) ? body : undefined;
  const message = details?.message ?? `${spec.method} ${spec.path} returned ${String(status)}`;

  if (status === 401 || status === 403) {
    return createAuthenticationError(status, message);
  }
  if (status === 404) {
    return createNotFoundError(spec.resource, spec.id);
  }
  return createApiError(status, details?.code ?? null, message);
};

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

export const createNotionTransport = (options: NotionTransportOptions): DatasetTransport => {
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const log = options.logger.child({ component: 'NotionTransport' });

  const request = async <T extends TSchema, R>(
    spec: RequestSpec,
    validator: TypeCheck<T>,
    map: (body: Static<T>) => R
  ): Promise<Result<R, TransportError>> => {
    const startedAt = Date.now();
    let response: Response;

    try {
      response = await fetchImpl(`${baseUrl}${spec.path}`, {
        method: spec.method,
        headers: {
          Authorization: `Bearer ${options.token}`,
          'Notion-Version': options.notionVersion,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        ...(spec.body !== undefined && { body: JSON.stringify(spec.body) }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      log.warn({ method: spec.method, path: spec.path, err: error }, 'Request failed');
      return err(
        createNetworkError(`${spec.method} ${spec.path} failed: ${describeError(error)}`, error)
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return err(
        createNetworkError(`Failed to read response of ${spec.method} ${spec.path}`, error)
      );
    }

    const body = parseBody(text);

    log.debug(
      {
        method: spec.method,
        path: spec.path,
        status: response.status,
        durationMs: Date.now() - startedAt,
      },
      'Request completed'
    );

    if (!response.ok) {
      return err(toHttpError(response.status, body, spec));
    }

    if (!validator.Check(body)) {
      return err(
        createInvalidResponseError(
          `Unexpected response body from ${spec.method} ${spec.path}`,
          formatSchemaErrors(validator.Errors(body))
        )
      );
    }

    return ok(map(body));
  };

  return {
    fetchSchema(datasetId) {
      return request(
        {
          method: 'GET',
          path: `/v1/databases/${encodeURIComponent(datasetId)}`,
          resource: 'Dataset',
          id: datasetId,
        },
        databaseValidator,
        toRawSchema
      );
    },

    query(datasetId, queryOptions: QueryOptions = {}) {
      return request(
        {
          method: 'POST',
          path: `/v1/databases/${encodeURIComponent(datasetId)}/query`,
          body: {
            ...(queryOptions.pageSize !== undefined && { page_size: queryOptions.pageSize }),
            ...(queryOptions.cursor !== undefined && { start_cursor: queryOptions.cursor }),
            ...(queryOptions.filter !== undefined && { filter: queryOptions.filter }),
            ...(queryOptions.sorts !== undefined && { sorts: queryOptions.sorts }),
          },
          resource: 'Dataset',
          id: datasetId,
        },
        queryValidator,
        (body) => ({
          items: body.results.map(toRawRecord),
          nextCursor: body.next_cursor,
          hasMore: body.has_more,
        })
      );
    },

    createRecord(datasetId, properties: RawPropertyMap) {
      return request(
        {
          method: 'POST',
          path: '/v1/pages',
          body: { parent: { database_id: datasetId }, properties },
          resource: 'Dataset',
          id: datasetId,
        },
        pageValidator,
        toRawRecord
      );
    },

    updateRecord(recordId, properties: RawPropertyMap) {
      return request(
        {
          method: 'PATCH',
          path: `/v1/pages/${encodeURIComponent(recordId)}`,
          body: { properties },
          resource: 'Record',
          id: recordId,
        },
        pageValidator,
        toRawRecord
      );
    },

    searchDatasets(searchOptions: SearchOptions = {}) {
      return request(
        {
          method: 'POST',
          path: '/v1/search',
          body: {
            filter: { property: 'object', value: 'database' },
            ...(searchOptions.pageSize !== undefined && { page_size: searchOptions.pageSize }),
            ...(searchOptions.cursor !== undefined && { start_cursor: searchOptions.cursor }),
          },
          resource: 'Search',
          id: '',
        },
        searchValidator,
        (body) => ({
          items: body.results
            .filter((result) => result.object === 'database')
            .map((result) => ({
              id: result.id,
              title: (result.title ?? []).map((segment) => segment.plain_text),
            })),
          nextCursor: body.next_cursor,
          hasMore: body.has_more,
        })
      );
    },
  };
};
