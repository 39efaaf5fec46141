#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/utils/error-message';
import { runWaitCommand } from './run';

dotenv.config();

const logger = new Logger('WaitForServices');

runWaitCommand(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  logger,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  });
