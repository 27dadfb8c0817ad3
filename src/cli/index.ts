#!/usr/bin/env node
/**
 * @fileoverview klocfix CLI entry point
 *
 * @packageDocumentation
 */

import { runCli } from './main.js';
import { formatError } from './errors.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
