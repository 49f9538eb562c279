#!/usr/bin/env node
// src/index.ts is the main entry point to run CLI
import { main } from './cli/index.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
