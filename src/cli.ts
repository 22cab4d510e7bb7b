#!/usr/bin/env node
/**
 * Export CLI
 *
 * Exports every Diigo bookmark of the signed-in user to a CSV file that
 * Raindrop.io's importer accepts.
 *
 * Usage: diigo-export [output.csv]
 *
 * The API key comes from DIIGO_API_KEY. Username and password come from
 * DIIGO_USERNAME / DIIGO_PASSWORD when both are set, otherwise they are
 * prompted for (the password without echo on a terminal).
 */

import { Logger } from './observability/Logger';
import { runCli } from './cli/run';

runCli({
  env: process.env,
  args: process.argv.slice(2),
  io: { input: process.stdin, output: process.stdout },
  logger: new Logger({ format: 'pretty' }),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
