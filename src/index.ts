#!/usr/bin/env node
import 'dotenv/config';
import { main } from './cli.js';
import { logger } from './utils/logger.js';

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'PNCP digest crashed');
    process.exitCode = 1;
  });
