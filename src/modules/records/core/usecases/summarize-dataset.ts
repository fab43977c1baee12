/**
 * Summarize Dataset Use Case
 *
 * Pure summary of an extracted dataset: size, columns and the creation
 * date range.
 */

import type { DatasetRecord, SchemaModel } from '../types.js';

export interface DatasetSummaryReport {
  datasetId: string;
  title: string;
  recordCount: number;
  /** Schema field names, in schema order */
  fieldNames: string[];
  /** Earliest and latest creation day (YYYY-MM-DD), null for an empty dataset */
  createdRange: { earliest: string; latest: string } | null;
}

export const summarizeDataset = (
  schema: SchemaModel,
  records: readonly DatasetRecord[]
): DatasetSummaryReport => {
  let earliest: string | null = null;
  let latest: string | null = null;

  for (const { createdTime } of records) {
    if (createdTime === '') {
      continue;
    }
    // ISO-8601 UTC timestamps order lexicographically
    if (earliest === null || createdTime < earliest) {
      earliest = createdTime;
    }
    if (latest === null || createdTime > latest) {
      latest = createdTime;
    }
  }

  return {
    datasetId: schema.datasetId,
    title: schema.title,
    recordCount: records.length,
    fieldNames: schema.fields.map((field) => field.name),
    createdRange:
      earliest !== null && latest !== null
        ? { earliest: earliest.slice(0, 10), latest: latest.slice(0, 10) }
        : null,
  };
};
