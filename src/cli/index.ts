#!/usr/bin/env node

// src/cli/index.ts

import { createProgram } from './program';
import { errorMessage } from '../utils/errors';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
