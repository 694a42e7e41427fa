import * as readline from 'readline';
import { Writable } from 'stream';
import { ValidationError } from '../lib/errors';

/**
 * Questions the CLI asks. Prompts go to stderr so piped stdout stays clean.
 */
export interface Prompter {
  readonly interactive: boolean;
  confirm(question: string, defaultYes?: boolean): Promise<boolean>;
  secret(question: string): Promise<string>;
}

/**
 * Prompt user for yes/no confirmation
 */
export function confirm(question: string, defaultYes = false): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  const suffix = defaultYes ? '[Y/n]' : '[y/N]';

  return new Promise((resolve) => {
    rl.question(`${question} ${suffix}: `, (answer) => {
      rl.close();
      const input = answer.trim().toLowerCase();

      if (input === '') {
        resolve(defaultYes);
      } else {
        resolve(input === 'y' || input === 'yes');
      }
    });
  });
}

/**
 * Prompt for a value without echoing what is typed
 */
export function promptSecret(question: string): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, _encoding, callback) {
      if (!muted) {
        process.stderr.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: true,
  });

  return new Promise((resolve) => {
    rl.question(`${question}: `, (answer) => {
      rl.close();
      process.stderr.write('\n');
      resolve(answer);
    });
    muted = true;
  });
}

/**
 * Prompter bound to the terminal. Without a TTY every question fails with a
 * ValidationError naming the flag that answers it.
 */
export function createTerminalPrompter(interactive = Boolean(process.stdin.isTTY)): Prompter {
  const refuse = (question: string): Promise<never> =>
    Promise.reject(new ValidationError(`Cannot ask "${question}" without a terminal. Pass the answer as a flag.`));

  return {
    interactive,
    confirm: (question, defaultYes) => (interactive ? confirm(question, defaultYes) : refuse(question)),
    secret: (question) => (interactive ? promptSecret(question) : refuse(question)),
  };
}
