/**
 * Confirmation gate consulted before each transfer
 */

import { createInterface } from "node:readline/promises";
import * as logger from "../../utils/logger.js";

export interface Confirmer {
  confirm(description: string): Promise<boolean>;
}

/**
 * Declines everything and reports what would have happened
 */
export const createDryRunConfirmer = (verbosity: number = logger.Verbosity.Normal): Confirmer => ({
  confirm: async (description) => {
    logger.info(`Dry run: ${description}`, verbosity);
    return false;
  },
});

export interface PromptConfirmerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Asks on the terminal for every item; only "y" or "yes" proceeds
 */
export const createPromptConfirmer = (options: PromptConfirmerOptions = {}): Confirmer => ({
  confirm: async (description) => {
    const rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    try {
      const answer = await rl.question(`${description}? [y/N] `);
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  },
});
