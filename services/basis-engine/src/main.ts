#!/usr/bin/env node
import 'dotenv/config';
import { errorMessage } from '@basis-desk/shared';
import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
