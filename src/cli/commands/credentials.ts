/**
 * CLI Credentials Command
 *
 * Manages the stored dictionary API key.
 *
 * - `credentials set <key>` stores (or replaces) the key
 * - `credentials clear` removes it
 * - `credentials status` reports whether one is stored, never the key itself
 */

import { Command } from 'commander';
import { hasCredential } from '../../storage';
import type { CliContext } from '../context';
import { dim, green, red, yellow } from '../utils/terminal';

export function createCredentialsCommand(ctx: CliContext): Command {
  const credentialsCmd = new Command('credentials').description('Manage the dictionary API key');

  credentialsCmd
    .command('set <key>')
    .description('Store the dictionary API key')
    .action((key: string) => {
      const trimmed = key.trim();
      if (trimmed === '') {
        console.log(red('Error: API key must not be blank.'));
        process.exitCode = 1;
        return;
      }

      if (!ctx.services().credentials.set(trimmed)) {
        console.log(red('Error: Failed to store the API key.'));
        process.exitCode = 1;
        return;
      }

      console.log(green('API key saved.'));
      console.log(dim('Evaluations now use the external dictionary unless --no-external is given.'));
    });

  credentialsCmd
    .command('clear')
    .description('Remove the stored API key')
    .action(() => {
      ctx.services().credentials.clear();
      console.log(green('API key cleared.'));
    });

  credentialsCmd
    .command('status')
    .description('Show whether an API key is stored')
    .action(() => {
      if (hasCredential(ctx.services().credentials)) {
        console.log(green('An API key is configured.'));
      } else {
        console.log(yellow('No API key is configured.'));
      }
    });

  return credentialsCmd;
}
