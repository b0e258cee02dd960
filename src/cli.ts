#!/usr/bin/env node
/**
 * leak-triage command entry point
 */

import { runCli } from './handlers/cli.handler';
import { errorMessage } from './utils/errors';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  });
