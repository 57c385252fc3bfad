/**
 * Shared CLI helper functions used by the command handlers
 */

import * as readline from 'readline';
import type { Prompt } from '../processors/confirmation-gate.js';
import { ConfigurationError } from './errors.js';

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Aborted: 2,
  Interrupted: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Interactive single-line prompt using Node.js readline.
 * Throws if stdin is not a TTY (pipe, CI) -- use --confirm to supply the token in those environments.
 * The answer is returned exactly as typed (only the line terminator is removed).
 */
export const readlinePrompt: Prompt = async (message) => {
  if (!process.stdin.isTTY) {
    throw new ConfigurationError(
      'Interactive confirmation required. Use --confirm "<token>" in non-interactive environments.'
    );
  }
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    // Ctrl+C at the prompt answers with nothing, which never matches a token
    rl.on('SIGINT', () => {
      rl.close();
      resolve('');
    });
    rl.question(message, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
};

/** Prompt that answers with a token supplied up front via --confirm */
export function presetPrompt(answer: string): Prompt {
  return async (message) => {
    console.log(`${message}${answer}`);
    return answer;
  };
}
