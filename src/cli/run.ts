// src/cli/run.ts

import { DiigoExporter } from '../exporter';
import type { Logger } from '../observability/Logger';
import { credentialsFromEnv, loadConfigFromEnv, readApiKey } from '../config/env';
import type { Env } from '../config/env';
import { describeError } from '../utils/errors';
import { readLogin } from './login';
import type { PromptIO } from './login';

export interface CliContext {
  env: Env;
  args: readonly string[];
  io: PromptIO;
  logger: Logger;
}

/**
 * Run one export from the command line
 *
 * Credentials come from DIIGO_USERNAME / DIIGO_PASSWORD when both are set,
 * otherwise from the prompt. `args[0]` overrides the output path.
 *
 * @returns Process exit code
 */
export async function runCli({ env, args, io, logger }: CliContext): Promise<number> {
  let exporter: DiigoExporter;

  try {
    // Fail on a missing key before asking for anything
    readApiKey(env);
    const login = credentialsFromEnv(env) ?? (await readLogin(io));
    exporter = DiigoExporter.init(loadConfigFromEnv(env, login));
  } catch (error) {
    logger.error('Cannot start export', describeError(error));
    return 1;
  }

  try {
    await exporter.export(args[0]);
    return 0;
  } catch {
    // Logged with full details by the exporter
    return 1;
  }
}
