/**
 * Interactive Prompts
 *
 * Questions are asked on the terminal through readline. Autocomplete
 * candidates are offered with Tab. Without a TTY nothing is asked and
 * every question comes back unanswered. Closing the input while a
 * question is open (Ctrl+C, EOF) aborts the command.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { UserAbortedError } from '../errors';

export type AutocompleteSource = readonly string[] | (() => Promise<readonly string[]>);

export interface Question {
  message: string;
  /** Candidates offered on Tab; a function is only called when the question is asked */
  autocomplete?: AutocompleteSource;
  /** Shown next to the question; applied by the caller when the answer is empty */
  default?: string;
}

export interface Prompter {
  /** Returns the trimmed answer, or null when nothing can be asked */
  ask(question: Question): Promise<string | null>;
  /** Yes/no question defaulting to no */
  confirm(message: string): Promise<boolean>;
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  interactive?: boolean;
  /** Treat the streams as a terminal (line editing, Tab completion) */
  terminal?: boolean;
  noColor?: boolean;
}

/**
 * Prefix completer for readline, case-insensitive
 */
export function createCompleter(candidates: readonly string[]): readline.Completer {
  return (line: string): [string[], string] => {
    const needle = line.toLowerCase();
    const hits = candidates.filter((candidate) => candidate.toLowerCase().startsWith(needle));
    return [hits, line];
  };
}

export function isAffirmative(answer: string | null): boolean {
  return answer !== null && /^y(es)?$/i.test(answer.trim());
}

export class ReadlinePrompter implements Prompter {
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private interactive: boolean;
  private terminal: boolean;
  private noColor: boolean;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.interactive = options.interactive ?? Boolean(process.stdin.isTTY);
    this.terminal = options.terminal ?? this.interactive;
    this.noColor = options.noColor ?? false;
  }

  async ask(question: Question): Promise<string | null> {
    if (!this.interactive) {
      return null;
    }

    const candidates =
      typeof question.autocomplete === 'function' ? await question.autocomplete() : question.autocomplete;
    const suffix = question.default ? ` [${question.default}]` : '';

    return this.readLine(`${this.style(question.message)}${suffix}: `, candidates);
  }

  async confirm(message: string): Promise<boolean> {
    if (!this.interactive) {
      return false;
    }

    const answer = await this.readLine(`${this.style(message)} [y/N] `);
    return isAffirmative(answer);
  }

  private style(message: string): string {
    return this.noColor ? message : chalk.cyan(message);
  }

  private readLine(prompt: string, candidates?: readonly string[]): Promise<string> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      completer: candidates && candidates.length > 0 ? createCompleter(candidates) : undefined,
      terminal: this.terminal,
    });

    return new Promise((resolve, reject) => {
      let answered = false;

      rl.on('close', () => {
        if (!answered) reject(new UserAbortedError());
      });

      rl.question(prompt, (answer) => {
        answered = true;
        rl.close();
        resolve(answer.trim());
      });
    });
  }
}
