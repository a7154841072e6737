/**
 * symdoc - Terminal Picker
 * @module cli/picker
 *
 * Numbered single-choice prompt used by `symdoc lookup` when a name has
 * several close matches.
 */

import * as readline from 'readline';

import type { Disambiguator } from '../resolver/resolver.js';

export interface TerminalPickerConfig {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  title?: string;
}

/**
 * Parse the answer to a picker prompt: 1-based choice to 0-based index,
 * anything else to -1
 */
export function parseChoice(answer: string, count: number): number {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return -1;
  const choice = Number.parseInt(trimmed, 10);
  return choice >= 1 && choice <= count ? choice - 1 : -1;
}

export class TerminalPicker implements Disambiguator {
  private config: Required<TerminalPickerConfig>;

  constructor(config: TerminalPickerConfig = {}) {
    this.config = {
      input: config.input ?? process.stdin,
      output: config.output ?? process.stderr,
      title: config.title ?? 'Select API',
    };
  }

  pick(candidates: readonly string[]): Promise<number> {
    const { input, output, title } = this.config;

    output.write(`\n${title}\n`);
    candidates.forEach((candidate, index) => {
      output.write(`  ${index + 1}) ${candidate}\n`);
    });

    const rl = readline.createInterface({ input, output });

    return new Promise((resolve) => {
      let answered = false;
      rl.question(`Choice [1-${candidates.length}, empty to cancel]: `, (answer) => {
        answered = true;
        rl.close();
        resolve(parseChoice(answer, candidates.length));
      });
      // End of input counts as cancelling
      rl.on('close', () => {
        if (!answered) resolve(-1);
      });
    });
  }
}
