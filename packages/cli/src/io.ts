/**
 * Readline helpers for the single interactive prompt the CLI shows.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

export type Confirm = (question: string) => Promise<boolean>;

export const EXECUTE_PROMPT = '› Execute command? [y/n]: ';

export function createInterface(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): readline.Interface {
  return readline.createInterface({ input, output, terminal: Boolean(process.stdin.isTTY) });
}

export async function askHuman(rl: readline.Interface, prompt: string): Promise<string> {
  const answer = await new Promise<string>((resolve) => {
    rl.question(chalk.bold.yellow(prompt), (response: string) => {
      resolve(response);
    });
  });
  return answer.trim();
}

/**
 * Anything other than an explicit "n" counts as consent.
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() !== 'n';
}

export const confirmInTerminal: Confirm = async (question) => {
  const rl = createInterface();
  try {
    return isAffirmative(await askHuman(rl, question));
  } finally {
    rl.close();
  }
};

export default {
  createInterface,
  askHuman,
  isAffirmative,
  confirmInTerminal,
};
