#!/usr/bin/env node

// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { argv } from 'process';
import { runCommandLine } from './cli/run';

async function main() {
  process.exitCode = await runCommandLine(argv.slice(2));
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
