#!/usr/bin/env -S npx tsx
/**
 * nex-run entry point. SIGINT and SIGTERM stop the frame loop, which then
 * tears the runtime down and exits with code 0.
 */

import { createConsoleLogger } from '@nex/core';

import { abortOnInterrupt, runNexCli } from './cli.js';

const controller = new AbortController();
abortOnInterrupt(process, controller);

process.exitCode = await runNexCli(process.argv.slice(2), {
  createLogger: (verbose) => createConsoleLogger({ verbose }),
  signal: controller.signal,
});
