/**
 * Interactive Prompt
 * 
 * Asks for library names when none were given on the command line.
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';
import { MissingInputError } from '@pylayer/core';
import { isNonEmptyString } from '@pylayer/utils';

export const LIBRARIES_PROMPT = 'Please enter the pip library names (separated by spaces): ';

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export type Ask = (question: string) => Promise<string>;

/**
 * Ask a single question; end of input or Ctrl-C counts as an empty answer
 */
export function askQuestion(question: string, streams: PromptStreams = {}): Promise<string> {
  const rl = createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });

  return new Promise<string>((resolve) => {
    let answered = false;

    rl.on('SIGINT', () => rl.close());

    rl.on('close', () => {
      if (!answered) {
        resolve('');
      }
    });

    rl.question(chalk.yellow(question), (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

export function splitLibraries(answer: string): string[] {
  return answer.split(/\s+/).filter(isNonEmptyString);
}

export interface LibrarySource {
  libraries?: string[];
  requirementsFile?: string;
}

export interface ResolveOptions {
  interactive: boolean;
  ask?: Ask;
}

/**
 * Libraries from the command line, or from the prompt when neither
 * libraries nor a requirements file was given
 */
export async function resolveLibraries(
  source: LibrarySource,
  options: ResolveOptions
): Promise<string[]> {
  const libraries = (source.libraries ?? []).filter(isNonEmptyString);

  if (libraries.length > 0 || source.requirementsFile) {
    return libraries;
  }

  if (options.interactive) {
    const ask = options.ask ?? askQuestion;
    const prompted = splitLibraries(await ask(LIBRARIES_PROMPT));
    if (prompted.length > 0) {
      return prompted;
    }
  }

  throw new MissingInputError();
}
