#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from '../interfaces/cli/index.js';

dotenv.config();

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[picture-book] Unexpected error:', error);
    process.exitCode = 1;
  }
);
