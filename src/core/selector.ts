import readline from 'node:readline';

import type { Installation } from './discovery.js';
import { SwitchError } from './errors.js';

/**
 * Map one line of user input onto a candidate. An empty line falls back to
 * the configured default; anything else must be a 1-based index.
 */
export function resolveSelection(
  input: string,
  installations: Installation[],
  defaultVersionName?: string
): Installation {
  const answer = input.trim();

  if (answer === '') {
    const fallback = defaultVersionName
      ? installations.find((installation) => installation.name === defaultVersionName)
      : undefined;
    if (!fallback) {
      const reason = defaultVersionName
        ? `default version "${defaultVersionName}" is not installed`
        : 'no default version is configured';
      throw new SwitchError('NoSelectionAndNoDefault', `No version selected and ${reason}`);
    }
    return fallback;
  }

  const range = `1-${installations.length}`;
  if (!/^[0-9]+$/.test(answer)) {
    throw new SwitchError('InvalidSelection', `Invalid selection "${answer}": enter a number (${range})`);
  }
  const index = parseInt(answer, 10);
  const chosen = index >= 1 ? installations[index - 1] : undefined;
  if (!chosen) {
    throw new SwitchError('InvalidSelection', `Invalid selection "${answer}": enter a number (${range})`);
  }
  return chosen;
}

export type PromptFn = (question: string) => Promise<string>;

/**
 * Ask one question on the terminal. A closed input stream resolves to an
 * empty answer.
 */
export function askLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output, terminal: false });
    let answered = false;
    rl.on('close', () => {
      if (!answered) {
        answered = true;
        resolve('');
      }
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}
