/**
 * Extracts every record of one dataset and prints them as JSON rows.
 *
 * Usage:
 *   NOTION_TOKEN=... npm run extract -- <dataset id or URL>
 */

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  createNotionTransport,
  extractDataset,
  extractDatasetIdFromUrl,
  loadSchema,
  summarizeDataset,
  toPlainRow,
} from '../src/modules/records/index.js';

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const target = process.argv[2];
  if (target === undefined || target === '') {
    logger.error('Usage: extract-dataset <dataset id or URL>');
    return 1;
  }

  const token = config.api.token;
  if (token === undefined) {
    logger.error('NOTION_TOKEN is not set');
    return 1;
  }

  const datasetId = target.startsWith('http') ? extractDatasetIdFromUrl(target) : target;
  if (datasetId === null) {
    logger.error({ target }, 'Could not find a dataset id in the URL');
    return 1;
  }

  const transport = createNotionTransport({
    token,
    baseUrl: config.api.baseUrl,
    notionVersion: config.api.version,
    timeoutMs: config.api.timeoutMs,
    logger,
  });

  const schema = await loadSchema({ transport, logger }, datasetId);
  if (schema.isErr()) {
    logger.error({ err: schema.error }, schema.error.message);
    return 1;
  }

  const { records, error } = await extractDataset(
    { transport, logger },
    { schema: schema.value, pageSize: config.api.pageSize }
  );

  process.stdout.write(`${JSON.stringify(records.map(toPlainRow), null, 2)}\n`);
  logger.info(summarizeDataset(schema.value, records), 'Extraction summary');

  if (error !== null) {
    logger.error({ err: error, extracted: records.length }, 'Extraction incomplete');
    return 2;
  }

  return 0;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
