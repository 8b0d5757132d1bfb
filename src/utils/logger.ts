/**
 * Console logger with verbosity levels
 * Errors are always printed; everything else respects the active verbosity
 */

import chalk from "chalk";
import { Verbosity } from "../interfaces/logger.js";

export { Verbosity };

export const verbose = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Verbose) {
    console.log(chalk.gray(message));
  }
};

export const info = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.log(chalk.blue(message));
  }
};

export const success = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.log(chalk.green(message));
  }
};

export const warning = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.warn(chalk.yellow(message));
  }
};

export const error = (message: string, _verbosity?: number): void => {
  console.error(chalk.red(message));
};

// Printed regardless of verbosity (summaries, final results)
export const always = (message: string): void => {
  console.log(message);
};

export const verbosityFromFlags = (flags: { quiet?: boolean; verbose?: boolean }): Verbosity => {
  if (flags.quiet) {
    return Verbosity.Quiet;
  }
  if (flags.verbose) {
    return Verbosity.Verbose;
  }
  return Verbosity.Normal;
};
