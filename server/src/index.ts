#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli';
import logger from './utils/logger';

dotenv.config();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'unexpected error');
    process.exit(1);
  });
