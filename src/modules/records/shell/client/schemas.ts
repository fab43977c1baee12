/**
 * Wire schemas for the service's JSON responses.
 *
 * Only the members the client reads are declared; everything else the
 * service sends is allowed through.
 */

import { Type, type Static } from '@sinclair/typebox';

const RichTextSchema = Type.Array(Type.Object({ plain_text: Type.String() }));

const OptionListSchema = Type.Object({
  options: Type.Array(Type.Object({ name: Type.String() })),
});

export const PropertyDescriptorSchema = Type.Object({
  type: Type.String(),
  select: Type.Optional(OptionListSchema),
  multi_select: Type.Optional(OptionListSchema),
});

export const DatabaseResponseSchema = Type.Object({
  id: Type.String(),
  title: Type.Optional(RichTextSchema),
  properties: Type.Record(Type.String(), PropertyDescriptorSchema),
});

export const PageResponseSchema = Type.Object({
  id: Type.String(),
  created_time: Type.String(),
  last_edited_time: Type.String(),
  url: Type.String(),
  properties: Type.Record(Type.String(), Type.Unknown()),
});

const CursorFields = {
  next_cursor: Type.Union([Type.String(), Type.Null()]),
  has_more: Type.Boolean(),
};

export const QueryResponseSchema = Type.Object({
  results: Type.Array(PageResponseSchema),
  ...CursorFields,
});

export const SearchResponseSchema = Type.Object({
  results: Type.Array(
    Type.Object({
      object: Type.String(),
      id: Type.String(),
      title: Type.Optional(RichTextSchema),
    })
  ),
  ...CursorFields,
});

export const ErrorResponseSchema = Type.Object({
  code: Type.Optional(Type.String()),
  message: Type.Optional(Type.String()),
});

export type DatabaseResponse = Static<typeof DatabaseResponseSchema>;
export type PageResponse = Static<typeof PageResponseSchema>;
export type QueryResponse = Static<typeof QueryResponseSchema>;
export type SearchResponse = Static<typeof SearchResponseSchema>;
