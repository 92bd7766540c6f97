/**
 * Line prompter over node:readline
 *
 * Resolves each question with the next input line, or null once input
 * has ended. Lines that arrive before a question is asked are buffered,
 * so piped input works the same as a terminal.
 *
 * @module cli/prompter
 */

import { createInterface } from 'node:readline';

export interface Prompter {
  /** Next answer, or null at end of input */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const buffered: string[] = [];
  const waiting: Array<(answer: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(question: string): Promise<string | null> {
      output.write(question);
      const next = buffered.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl.close();
    },
  };
}
