import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

/**
 * True when the module at `moduleUrl` is the script Node was started with.
 * Symlinks (npm `bin` shims) are resolved before comparing.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(script)).href === moduleUrl;
  } catch {
    return pathToFileURL(script).href === moduleUrl;
  }
}
