#!/usr/bin/env node
/**
 * Report Parser CLI entry point
 *
 * Loads .env from the working directory, then hands argv to the CLI.
 */

import dotenv from 'dotenv';
import { logger } from '@labparse/shared';
import { runCli } from './cli';

dotenv.config();

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error);
    process.exitCode = 1;
  });
