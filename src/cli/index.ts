#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point for the Vocabulary Tutor
 *
 * Available Commands:
 * - `evaluate <word> <sentence...>` - Evaluate one sentence
 * - `credentials set|clear|status` - Manage the dictionary API key
 * - `serve` - Start the HTTP API
 *
 * Usage:
 * ```bash
 * npm run cli -- evaluate happy I feel happy today.
 * npm run cli -- evaluate happy "I feel happy today." --json
 * npm run cli -- credentials set test-secret
 * npm run cli -- serve --port 8080
 * ```
 *
 * Configuration comes from the environment (see src/config.ts); the stored
 * API key lives in the SQLite file at DATABASE_PATH.
 */

import { Command } from 'commander';
import { APP_VERSION } from '../api/routes/health';
import { ConfigValidationError } from '../config';
import { isEntryPoint } from '../utils/entry-point';
import { createCliContext, type CliContext } from './context';
import { createCredentialsCommand, createEvaluateCommand, createServeCommand } from './commands';
import { dim, red } from './utils/terminal';

/**
 * Builds the commander program with every command attached.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command('vocab-tutor')
    .description('Checks how a vocabulary word is used in a sentence')
    .version(APP_VERSION);

  program.addCommand(createEvaluateCommand(ctx));
  program.addCommand(createCredentialsCommand(ctx));
  program.addCommand(createServeCommand(ctx));

  return program;
}

/**
 * Parses the process arguments and runs the chosen command.
 */
async function main(): Promise<void> {
  await createProgram(createCliContext()).parseAsync(process.argv);
}

if (isEntryPoint(import.meta.url)) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigValidationError) {
      console.error(red('Configuration error:'));
      for (const invalid of error.invalidVars) {
        console.error(`  ${invalid.name}: ${dim(invalid.reason)}`);
      }
    } else {
      console.error(red('\nFatal error:'));
      console.error(dim(error instanceof Error ? error.message : String(error)));

      // Show stack trace when debugging
      if (process.env.DEBUG && error instanceof Error) {
        console.error(dim(error.stack ?? ''));
      }
    }

    process.exit(1);
  });
}
