/**
 * Interactive confirmation for significant index changes
 */

import * as readline from 'readline';

export const CONFIRM_QUESTION = 'Proceed with index update? [y/N]: ';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Ask once. Closed input or Ctrl+C counts as "no".
 */
export async function askYesNo(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  const rl = readline.createInterface({ input: streams.input, output: streams.output });

  const answer = await new Promise<string>((resolve) => {
    rl.on('close', () => resolve(''));
    rl.on('SIGINT', () => {
      streams.output.write('\n');
      rl.close();
    });
    rl.question(question, resolve);
  });
  rl.close();

  return isApproval(answer);
}

/**
 * Routine changes are approved without asking
 */
export async function confirmUpdate(significant: boolean, streams?: PromptStreams): Promise<boolean> {
  if (!significant) {
    return true;
  }

  console.log('');
  console.log('Significant changes detected.');
  return askYesNo(CONFIRM_QUESTION, streams);
}
