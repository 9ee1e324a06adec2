/**
 * CLI Evaluate Command
 *
 * Evaluates one word and sentence from the command line.
 *
 * Usage Examples:
 * ```bash
 * # Colored report
 * npm run cli -- evaluate resilient I am resilient when I feel sad.
 *
 * # Sorted JSON document, forcing the external dictionary
 * npm run cli -- evaluate tapestry "The tapestry is old." --external --json
 * ```
 *
 * Without --external or --no-external, the external dictionary is used when
 * an API key is stored.
 */

import { Command } from 'commander';
import { formatTutorResponse } from '../../core/export';
import { hasCredential } from '../../storage';
import type { CliContext } from '../context';
import { printEvaluationReport } from '../utils/terminal';

/**
 * Options parsed by commander for the evaluate command.
 */
interface EvaluateOptions {
  external?: boolean;
  json?: boolean;
}

export function createEvaluateCommand(ctx: CliContext): Command {
  return new Command('evaluate')
    .description('Evaluate how a word is used in a sentence')
    .argument('<word>', 'the vocabulary word')
    .argument('<sentence...>', 'the sentence using the word')
    .option('--external', 'consult the external dictionary')
    .option('--no-external', 'never consult the external dictionary')
    .option('--json', 'print the result as a sorted JSON document')
    .action(async (word: string, sentenceParts: string[], options: EvaluateOptions) => {
      const { engine, credentials } = ctx.services();
      const useExternal = options.external ?? hasCredential(credentials);

      const result = await engine.evaluate(word, sentenceParts.join(' '), useExternal);

      if (options.json) {
        console.log(formatTutorResponse(result));
      } else {
        printEvaluationReport(word, result);
      }
    });
}
