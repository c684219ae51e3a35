#!/usr/bin/env node
import 'reflect-metadata';
import { runCli } from './cli';
import { getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

runCli(process.argv).catch((error: unknown) => {
  logger.error(getErrorMessage(error), error);
  process.exitCode = 1;
});
