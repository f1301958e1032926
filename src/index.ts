#!/usr/bin/env node

import { runCli } from './cli';

void runCli(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`gpu-workspace: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
