import * as readline from 'node:readline/promises';

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Asks one question on a fresh line reader and closes it again, so the input
 * stream stays free for raw keypress handling in between
 */
export async function ask(
  input: TerminalInput,
  output: NodeJS.WritableStream,
  question: string
): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: input.isTTY === true });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
