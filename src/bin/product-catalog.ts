#!/usr/bin/env node
import { runCli } from '../cli/catalog.cli';
import { appConfig } from '../connections/config/app.config';
import { ProductCatalog } from '../modules/products/product-catalog';
import { logger, loggingConfig } from '../utils/logging';

// stdout carries command output only
loggingConfig.redirectConsole(logger, process.stderr);

const main = (): number => {
  const catalog = new ProductCatalog({ dbPath: appConfig.catalogPath });
  catalog.initialize();
  return runCli(catalog, process.argv.slice(2), {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
  });
};

try {
  process.exitCode = main();
} catch (error) {
  logger.error('Command failed', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exitCode = 1;
}
