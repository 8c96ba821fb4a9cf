#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { errorMessage } from './logging/logger.js';

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`recledger: ${errorMessage(err)}`);
    process.exit(1);
  });
