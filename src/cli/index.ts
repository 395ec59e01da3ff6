#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './commands';
import { logError } from '../observability/error-log';

createProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    logError(err, { context: 'cli_failed' });
    process.exit(1);
  });
