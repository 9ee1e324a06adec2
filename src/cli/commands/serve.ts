/**
 * CLI Serve Command
 *
 * Starts the HTTP API. `--port` overrides PORT for this run.
 */

import { Command, InvalidArgumentError } from 'commander';
import { startServer } from '../../api/server';
import type { CliContext } from '../context';

/**
 * Parses a TCP port argument for commander.
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function createServeCommand(ctx: CliContext): Command {
  return new Command('serve')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'preferred port', parsePort)
    .action(async (options: { port?: number }) => {
      const config = ctx.config();
      await startServer({
        ...config,
        server: { ...config.server, port: options.port ?? config.server.port },
      });
    });
}
