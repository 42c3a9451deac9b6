#!/usr/bin/env node

import { getConfig } from '../config';
import { createPriceResolver } from '../services/PriceResolverFactory';
import { SqliteQuoteStore } from '../storage/SqliteQuoteStore';
import { createLogger, setLogLevel } from '../utils/logger';
import { buildProgram } from './commands';

const config = getConfig();
// Children copy the root level when created, so set it before any exist.
setLogLevel(config.logLevel);

const logger = createLogger('cli');

const program = buildProgram({
  config,
  createResolver: resolverConfig =>
    createPriceResolver(resolverConfig, { store: SqliteQuoteStore.open(resolverConfig.dbPath) }),
  write: line => {
    process.stdout.write(`${line}\n`);
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, 'Command failed');
  process.exitCode = 1;
});
