/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];
  let onlyPositionals = false;

  const usageError = (error: string): ParsedArgs => ({
    command,
    positionals,
    options,
    error,
  });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is positional
    if (arg === "--" && !onlyPositionals) {
      onlyPositionals = true;
      continue;
    }

    if (onlyPositionals || !arg.startsWith("-") || arg === "-") {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    const value = (): string | undefined => {
      const next = args[i + 1];
      if (next === undefined) return undefined;
      i++;
      return next;
    };

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      case "-c":
      case "--config": {
        const config = value();
        if (config === undefined) return usageError(`${arg} requires a file`);
        options.config = config;
        break;
      }
      case "-r":
      case "--references": {
        const references = value();
        if (references === undefined) {
          return usageError(`${arg} requires a search path`);
        }
        options.references =
          options.references === undefined
            ? references
            : `${options.references};${references}`;
        break;
      }
      case "-o":
      case "--out": {
        const out = value();
        if (out === undefined) return usageError(`${arg} requires a file`);
        options.out = out;
        break;
      }
      case "-m":
      case "--module": {
        const identity = value();
        if (identity === undefined) {
          return usageError(`${arg} requires a module identity`);
        }
        options.identities = [...(options.identities ?? []), identity];
        break;
      }
      default:
        return usageError(`Unknown option: ${arg}`);
    }
  }

  return { command, positionals, options };
};
