/**
 * Terminal Prompt
 *
 * Reads answers from stdin, masking password input on a TTY.
 */

import readline from 'node:readline';

import type { CredentialPrompter } from './types.js';

function ask(question: string, masked: boolean): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    if (!masked || !process.stdin.isTTY) {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer);
      });
      return;
    }

    process.stdout.write(question);

    const stdin = process.stdin;
    const originalRawMode = stdin.isRaw;
    let input = '';

    const finish = (): void => {
      stdin.setRawMode(originalRawMode);
      stdin.removeListener('data', onData);
      stdin.pause();
      process.stdout.write('\n');
      rl.close();
    };

    const onData = (chunk: string): void => {
      for (const char of chunk) {
        // Ctrl+C
        if (char === '\u0003') {
          finish();
          reject(new Error('Prompt cancelled'));
          return;
        }

        if (char === '\r' || char === '\n') {
          finish();
          resolve(input);
          return;
        }

        // Backspace
        if (char === '\u007f' || char === '\b') {
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.write('\b \b');
          }
          continue;
        }

        input += char;
        process.stdout.write('*');
      }
    };

    stdin.setRawMode(true);
    stdin.resume();
    stdin.setEncoding('utf8');
    stdin.on('data', onData);
  });
}

/**
 * Prompter bound to the process terminal, or null without a TTY
 */
export function createTerminalPrompter(): CredentialPrompter | null {
  if (!process.stdin.isTTY) return null;
  return {
    ask: (question, options) => ask(question, options?.masked ?? false),
  };
}

/** An injected prompter (null: never prompt), else the terminal when interactive */
export function resolvePrompter(
  injected: CredentialPrompter | null | undefined,
  interactive: boolean
): CredentialPrompter | null {
  if (injected !== undefined) return injected;
  return interactive ? createTerminalPrompter() : null;
}
