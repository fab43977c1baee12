import pinoLogger from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { createNotionTransport } from '@/modules/records/shell/client/notion-transport.js';

import { rawProperty } from '../../fixtures/builders.js';

import type { Mock } from 'vitest';

const testLogger = pinoLogger({ level: 'silent' });

const jsonResponse = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const makeFetch = (...responses: Response[]): Mock<typeof fetch> => {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  return fetchMock;
};

const makeTransport = (fetchMock: Mock<typeof fetch>) =>
  createNotionTransport({
    token: 'test-secret',
    baseUrl: 'https://api.notion.test/',
    notionVersion: '2022-06-28',
    timeoutMs: 1000,
    logger: testLogger,
    fetch: fetchMock,
  });

const sentRequest = (fetchMock: Mock<typeof fetch>, index = 0) => {
  const call = fetchMock.mock.calls[index];
  const init = call?.[1];
  const rawBody = init?.body;
  const body: unknown = typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined;
  return { url: call?.[0], method: init?.method, headers: init?.headers, body };
};

const pageBody = (id: string) => ({
  object: 'page',
  id,
  created_time: '2024-01-10T09:00:00.000Z',
  last_edited_time: '2024-01-11T09:00:00.000Z',
  url: `https://www.notion.so/${id}`,
  archived: false,
  properties: { Name: rawProperty.title(id) },
});

describe('createNotionTransport', () => {
  describe('fetchSchema', () => {
    it('sends an authenticated GET and maps the schema', async () => {
      const fetchMock = makeFetch(
        jsonResponse(200, {
          object: 'database',
          id: 'db-1',
          title: [{ type: 'text', plain_text: 'Team ' }, { type: 'text', plain_text: 'Tasks' }],
          properties: {
            Name: { id: 'title', name: 'Name', type: 'title', title: {} },
            Status: {
              id: 'st',
              name: 'Status',
              type: 'select',
              select: { options: [{ id: 'o1', name: 'To Do', color: 'red' }, { id: 'o2', name: 'Done', color: 'green' }] },
            },
          },
        })
      );

      const result = await makeTransport(fetchMock).fetchSchema('db-1');

      expect(sentRequest(fetchMock)).toEqual({
        url: 'https://api.notion.test/v1/databases/db-1',
        method: 'GET',
        headers: {
          Authorization: 'Bearer test-secret',
          'Notion-Version': '2022-06-28',
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: undefined,
      });

      const schema = result._unsafeUnwrap();
      expect(schema.id).toBe('db-1');
      expect(schema.title).toEqual(['Team ', 'Tasks']);
      expect(schema.properties['Name']).toEqual({ type: 'title' });
      expect(schema.properties['Status']?.options?.map((option) => option.name)).toEqual([
        'To Do',
        'Done',
      ]);
    });

    it('maps a 404 to NotFoundError for the dataset', async () => {
      const fetchMock = makeFetch(
        jsonResponse(404, { object: 'error', status: 404, code: 'object_not_found', message: 'Could not find database' })
      );

      const result = await makeTransport(fetchMock).fetchSchema('db-9');

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'NotFoundError',
        message: "Dataset with id 'db-9' not found",
        resource: 'Dataset',
        id: 'db-9',
      });
    });

    it('maps a 401 to AuthenticationError with the service message', async () => {
      const fetchMock = makeFetch(
        jsonResponse(401, { object: 'error', status: 401, code: 'unauthorized', message: 'API token is invalid.' })
      );

      const result = await makeTransport(fetchMock).fetchSchema('db-1');

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'AuthenticationError',
        message: 'API token is invalid.',
        status: 401,
      });
    });
  });

  describe('query', () => {
    it('sends paging, filter and sorts and maps the page', async () => {
      const fetchMock = makeFetch(
        jsonResponse(200, {
          object: 'list',
          results: [pageBody('rec-1')],
          next_cursor: 'c2',
          has_more: true,
        })
      );
      const filter = { property: 'Done', checkbox: { equals: true } };
      const sorts = [{ timestamp: 'created_time' as const, direction: 'descending' as const }];

      const result = await makeTransport(fetchMock).query('db-1', {
        pageSize: 50,
        cursor: 'c1',
        filter,
        sorts,
      });

      const request = sentRequest(fetchMock);
      expect(request.url).toBe('https://api.notion.test/v1/databases/db-1/query');
      expect(request.method).toBe('POST');
      expect(request.body).toEqual({ page_size: 50, start_cursor: 'c1', filter, sorts });

      expect(result._unsafeUnwrap()).toEqual({
        items: [
          {
            id: 'rec-1',
            createdTime: '2024-01-10T09:00:00.000Z',
            lastEditedTime: '2024-01-11T09:00:00.000Z',
            url: 'https://www.notion.so/rec-1',
            properties: { Name: rawProperty.title('rec-1') },
          },
        ],
        nextCursor: 'c2',
        hasMore: true,
      });
    });

    it('sends an empty body when no options are given', async () => {
      const fetchMock = makeFetch(
        jsonResponse(200, { object: 'list', results: [], next_cursor: null, has_more: false })
      );

      const result = await makeTransport(fetchMock).query('db-1');

      expect(sentRequest(fetchMock).body).toEqual({});
      expect(result._unsafeUnwrap()).toEqual({ items: [], nextCursor: null, hasMore: false });
    });

    it('maps a 429 to a retryable ApiError', async () => {
      const fetchMock = makeFetch(
        jsonResponse(429, { object: 'error', status: 429, code: 'rate_limited', message: 'Slow down' })
      );

      const result = await makeTransport(fetchMock).query('db-1');

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'ApiError',
        message: 'Slow down',
        status: 429,
        code: 'rate_limited',
        retryable: true,
      });
    });

    it('describes a server error without a JSON body', async () => {
      const fetchMock = makeFetch(new Response('upstream failure', { status: 500 }));

      const result = await makeTransport(fetchMock).query('db-1');

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'ApiError',
        message: 'POST /v1/databases/db-1/query returned 500',
        status: 500,
        code: null,
        retryable: true,
      });
    });

    it('treats a 400 as not retryable', async () => {
      const fetchMock = makeFetch(
        jsonResponse(400, { object: 'error', status: 400, code: 'validation_error', message: 'Bad filter' })
      );

      const result = await makeTransport(fetchMock).query('db-1');

      const error = result._unsafeUnwrapErr();
      expect(error.type === 'ApiError' && error.retryable).toBe(false);
    });

    it('rejects a success body of the wrong shape', async () => {
      const fetchMock = makeFetch(jsonResponse(200, { results: 'nope' }));

      const result = await makeTransport(fetchMock).query('db-1');

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('InvalidResponseError');
      expect(error.message).toBe('Unexpected response body from POST /v1/databases/db-1/query');
      expect(error.type === 'InvalidResponseError' && error.details.length > 0).toBe(true);
    });

    it('maps a failed fetch to a retryable NetworkError', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await makeTransport(fetchMock).query('db-1');

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('NetworkError');
      expect(error.message).toBe('POST /v1/databases/db-1/query failed: fetch failed');
      expect(error.type === 'NetworkError' && error.retryable).toBe(true);
    });
  });

  describe('records', () => {
    it('creates a record under its dataset', async () => {
      const fetchMock = makeFetch(jsonResponse(200, pageBody('rec-new')));
      const properties = { Name: { type: 'title', title: [{ type: 'text', text: { content: 'x' } }] } };

      const result = await makeTransport(fetchMock).createRecord('db-1', properties);

      expect(sentRequest(fetchMock)).toMatchObject({
        url: 'https://api.notion.test/v1/pages',
        method: 'POST',
        body: { parent: { database_id: 'db-1' }, properties },
      });
      expect(result._unsafeUnwrap().id).toBe('rec-new');
    });

    it('updates a record with PATCH', async () => {
      const fetchMock = makeFetch(jsonResponse(200, pageBody('rec-1')));
      const properties = { Done: { type: 'checkbox', checkbox: true } };

      await makeTransport(fetchMock).updateRecord('rec-1', properties);

      expect(sentRequest(fetchMock)).toMatchObject({
        url: 'https://api.notion.test/v1/pages/rec-1',
        method: 'PATCH',
        body: { properties },
      });
    });

    it('reports a missing record as NotFoundError for the record', async () => {
      const fetchMock = makeFetch(jsonResponse(404, { object: 'error', status: 404 }));

      const result = await makeTransport(fetchMock).updateRecord('rec-9', {});

      expect(result._unsafeUnwrapErr().message).toBe("Record with id 'rec-9' not found");
    });
  });

  describe('searchDatasets', () => {
    it('searches for datasets and keeps only datasets', async () => {
      const fetchMock = makeFetch(
        jsonResponse(200, {
          object: 'list',
          results: [
            { object: 'database', id: 'db-1', title: [{ plain_text: 'Tasks' }] },
            { object: 'page', id: 'page-1' },
            { object: 'database', id: 'db-2' },
          ],
          next_cursor: null,
          has_more: false,
        })
      );

      const result = await makeTransport(fetchMock).searchDatasets({ pageSize: 100 });

      expect(sentRequest(fetchMock).body).toEqual({
        filter: { property: 'object', value: 'database' },
        page_size: 100,
      });
      expect(result._unsafeUnwrap()).toEqual({
        items: [
          { id: 'db-1', title: ['Tasks'] },
          { id: 'db-2', title: [] },
        ],
        nextCursor: null,
        hasMore: false,
      });
    });
  });
});
