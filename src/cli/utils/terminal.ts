/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing and formatting terminal output,
 * plus the report printer for evaluation results.
 *
 * Usage:
 * ```typescript
 * import { bold, green, printEvaluationReport } from './terminal';
 *
 * console.log(bold('Vocabulary Tutor'));
 * printEvaluationReport('happy', result);
 * ```
 *
 * In non-TTY environments, the codes pass through harmlessly.
 */

import type { EvaluationResult, UsageVerdict } from '../../core/models';

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 *
 * @example
 * console.log(bold('Meaning'));
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints or example sentences.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Creates a horizontal separator line for visual organization.
 *
 * @example
 * console.log(formatSeparator());
 * // Output: "──────────────────────────────────────────────────"
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Colors a verdict: green when correct, yellow when mostly correct, red otherwise.
 */
export function formatVerdict(status: UsageVerdict): string {
  switch (status) {
    case 'Correct':
      return green(status);
    case 'Mostly correct':
      return yellow(status);
    case 'Incorrect':
      return red(status);
    default: {
      const unhandled: never = status;
      return String(unhandled);
    }
  }
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}

/**
 * Prints a human-readable report of one evaluation.
 *
 * @param word - The word as the learner typed it
 */
export function printEvaluationReport(word: string, result: EvaluationResult): void {
  const { wordAnalysis, sentenceFeedback } = result;

  printBlankLine();
  console.log(`${bold(word.trim() || '(no word)')} ${dim(`[${wordAnalysis.difficulty}]`)}`);
  console.log(formatSeparator());
  console.log(`${bold('Meaning:')}  ${wordAnalysis.meaning}`);

  if (wordAnalysis.synonyms.length > 0) {
    console.log(`${bold('Synonyms:')} ${wordAnalysis.synonyms.join(', ')}`);
  }

  if (wordAnalysis.examples.length > 0) {
    console.log(bold('Examples:'));
    for (const example of wordAnalysis.examples) {
      console.log(`  ${dim('-')} ${example}`);
    }
  }

  console.log(formatSeparator());
  console.log(`${bold('Verdict:')}  ${formatVerdict(sentenceFeedback.status)}`);
  console.log(sentenceFeedback.explanation);

  if (sentenceFeedback.correctedSentence !== '') {
    console.log(`${bold('Try:')}      ${cyan(sentenceFeedback.correctedSentence)}`);
  }
  printBlankLine();
}
