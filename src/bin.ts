#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { errorMessage } from './utils/errors.js';
import { logger as log } from './utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.error(errorMessage(error));
    process.exit(1);
  });
