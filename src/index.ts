#!/usr/bin/env node
// src/index.ts

import * as dotenv from 'dotenv';
import { errorMessage } from './errors.js';
import { runReview } from './main.js';

dotenv.config();

runReview(process.env)
  .then(() => {
    process.exitCode = 0;
  })
  .catch((error: unknown) => {
    console.error(`🔴 Fatal Error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  });
