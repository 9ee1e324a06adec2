/**
 * CLI Context
 *
 * Lazily built configuration and services shared by the commands. Nothing
 * touches the environment or the database until a command asks for it, so
 * `--help` works without either.
 */

import { createTutorServices, type TutorServices } from '../bootstrap';
import { getConfig, type Config } from '../config';

export interface CliContext {
  config(): Config;
  services(): TutorServices;
}

/**
 * Builds the production context from `process.env`.
 */
export function createCliContext(): CliContext {
  let services: TutorServices | undefined;

  return {
    config: getConfig,
    services: () => {
      services ??= createTutorServices(getConfig());
      return services;
    },
  };
}
