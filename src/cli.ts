#!/usr/bin/env node
import { main } from './cli/main.js';
import { errorMessage } from './utils/httpErrors.js';
import { logger } from './utils/logger.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('cli.fatal', { errorMessage: errorMessage(error) });
    process.exitCode = 1;
  });
