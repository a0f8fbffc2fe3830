/**
 * Shared start-up for the API server and the report command:
 * environment, logger and the sheet files read from config/.
 */

import { parseEnv, createConfig, type AppConfig } from './config/index.js';
import { createLogger } from './logger/index.js';
import { loadLayoutRegistry } from '../modules/extraction/index.js';
import { loadKpiScoring } from '../modules/metrics/index.js';
import { createSheetSource, loadSheetCatalog } from '../modules/sheet-source/index.js';

import type { AppDeps } from '../app/build-app.js';
import type { Logger } from 'pino';

export interface Bootstrap {
  config: AppConfig;
  logger: Logger;
  deps: AppDeps;
}

export const bootstrap = (env: NodeJS.ProcessEnv, loggerName: string): Bootstrap => {
  // Parse and validate environment
  const config = createConfig(parseEnv(env));

  const logger = createLogger({
    level: config.logger.level,
    name: loggerName,
    pretty: config.logger.pretty,
  });

  const catalog = loadSheetCatalog(config.sheets.catalogFile);
  const layouts = loadLayoutRegistry();
  const scoring = loadKpiScoring();
  const sheetSource = createSheetSource(config.sheets, logger.child({ component: 'sheets' }));

  return {
    config,
    logger,
    deps: { config, logger, catalog, layouts, scoring, sheetSource },
  };
};
