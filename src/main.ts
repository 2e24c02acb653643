#!/usr/bin/env node

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install();

import { sllMain, sllMainError } from './lib/sll-main';
import { logger } from './lib/logger';
import { SLL_PROC_NAME } from './constants';
import { config } from './config';

(async () => {
  try {
    await main();
  } catch(e) {
    process.exitCode = sllMainError(e, logger, console.error);
  }
})();

async function main() {
  setProcName();

  process.on('SIGINT', () => {
    shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM');
  });
  process.on('unhandledRejection', (reason) => {
    console.error('unhandledRejection');
    console.error(reason);
    logger.error(reason, 'unhandledRejection');
  });

  await sllMain(process.argv, {
    logFn: console.log,
    logger,
    colors: process.stdout.isTTY && !config.NO_COLOR,
  });
}

function shutdown(sig: string) {
  let shutdownMsg: string;
  shutdownMsg = `${sig} received`;
  logger.info(shutdownMsg);
  console.log(`${shutdownMsg} - shutting down`);
  process.exit(0);
}

function setProcName() {
  process.title = SLL_PROC_NAME;
}
