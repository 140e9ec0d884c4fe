/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { map } from "@genapi/resolver";
import { loadConfig, findConfig, resolveConfig, CONFIG_FILE_NAME } from "../config.js";
import type { GenapiConfig, ParsedArgs, Result } from "../types.js";
import { generateCommand } from "../commands/generate.js";
import { resolveCommand } from "../commands/resolve.js";
import {
  EXIT_CONFIG,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const usage = (message: string): number => {
  console.error(`Error: ${message}`);
  console.error("Run 'genapi --help' for usage");
  return EXIT_USAGE;
};

const finish = <T>(result: Result<T, string>): number => {
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return EXIT_FAILURE;
  }
  return EXIT_SUCCESS;
};

/**
 * Locate and load genapi.json. No file is fine unless one was named.
 */
const loadProjectConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<{ config: GenapiConfig; projectRoot: string }, string> => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    return { ok: true, value: { config: {}, projectRoot: cwd } };
  }

  // Project root is the directory containing genapi.json
  return map(loadConfig(configPath), (config) => ({
    config,
    projectRoot: dirname(configPath),
  }));
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error !== undefined) {
    return usage(parsed.error);
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`genapi v${VERSION}`);
    return EXIT_SUCCESS;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_SUCCESS;
  }

  const command = parsed.command;
  if (command !== "generate" && command !== "resolve") {
    return usage(`Unknown command: ${command}`);
  }

  const loaded = loadProjectConfig(parsed, cwd);
  if (!loaded.ok) {
    console.error(`Error: ${loaded.error}`);
    return EXIT_CONFIG;
  }
  const { config, projectRoot } = loaded.value;

  // Dispatch to command handlers
  switch (command) {
    case "generate": {
      const [modules, references, output, ...extra] = parsed.positionals;
      if (extra.length > 0) {
        return usage(`Unexpected argument: ${extra.join(" ")}`);
      }
      const resolved = resolveConfig(
        config,
        {
          ...parsed.options,
          references: parsed.options.references ?? references,
          out: parsed.options.out ?? output,
        },
        projectRoot,
        modules,
        cwd
      );
      if (resolved.modules.length === 0) {
        return usage(
          `generate requires <modules> or 'modules' in ${CONFIG_FILE_NAME}`
        );
      }
      return finish(generateCommand(resolved));
    }

    case "resolve": {
      const named = [...parsed.positionals, ...(parsed.options.identities ?? [])];
      const resolved = resolveConfig(
        config,
        {
          ...parsed.options,
          identities: named.length > 0 ? named : undefined,
        },
        projectRoot,
        undefined,
        cwd
      );
      if (resolved.identities.length === 0) {
        return usage(
          `resolve requires <identity> or 'identities' in ${CONFIG_FILE_NAME}`
        );
      }
      return finish(resolveCommand(resolved));
    }
  }
};
