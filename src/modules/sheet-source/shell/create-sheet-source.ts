/**
 * Picks the sheet adapter from configuration.
 *
 * `api` needs service-account credentials; without usable ones the public
 * CSV export is used instead.
 */

import { createCsvExportSource } from './csv/csv-export-source.js';
import {
  createGoogleSheetsSource,
  createGoogleValuesReader,
  parseServiceAccountJson,
  type GoogleCredentials,
} from './google/google-sheets-source.js';

import type { SheetSource } from '../core/ports.js';
import type { Logger } from 'pino';

export interface SheetSourceConfig {
  source: 'api' | 'csv';
  credentialsJson: string | undefined;
  credentialsFile: string | undefined;
  requestTimeoutMs: number;
}

const resolveCredentials = (
  config: SheetSourceConfig,
  logger: Logger
): GoogleCredentials | undefined => {
  if (config.credentialsJson !== undefined && config.credentialsJson !== '') {
    const parsed = parseServiceAccountJson(config.credentialsJson);
    if (parsed.isOk()) return parsed.value;
    logger.warn({ errorType: parsed.error.type }, parsed.error.message);
  }
  if (config.credentialsFile !== undefined && config.credentialsFile !== '') {
    return { kind: 'file', keyFile: config.credentialsFile };
  }
  return undefined;
};

export const createSheetSource = (config: SheetSourceConfig, logger: Logger): SheetSource => {
  if (config.source === 'api') {
    const credentials = resolveCredentials(config, logger);
    if (credentials !== undefined) {
      logger.info({ credentials: credentials.kind }, 'Reading sheets through the Google Sheets API');
      return createGoogleSheetsSource(createGoogleValuesReader(credentials, config.requestTimeoutMs));
    }
    logger.warn('No Google credentials configured, falling back to the public CSV export');
  }

  logger.info('Reading sheets through the public CSV export');
  return createCsvExportSource({ timeoutMs: config.requestTimeoutMs });
};
