/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, isAbsolute } from "node:path";
import { flatMap, splitSearchPath } from "@genapi/resolver";
import type { GenapiConfig, CliOptions, ResolvedConfig, Result } from "./types.js";

export const CONFIG_FILE_NAME = "genapi.json";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringList = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Validate the parsed contents of genapi.json
 */
export const validateConfig = (value: unknown): Result<GenapiConfig, string> => {
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const { $schema, modules, references, identities, output, strict } = value;

  for (const [key, list] of [
    ["modules", modules],
    ["references", references],
    ["identities", identities],
  ] as const) {
    if (list !== undefined && !isStringList(list)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: '${key}' must be an array of strings`,
      };
    }
  }

  if (output !== undefined && typeof output !== "string") {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'output' must be a string` };
  }

  if (strict !== undefined && typeof strict !== "boolean") {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'strict' must be a boolean` };
  }

  return {
    ok: true,
    value: {
      $schema: typeof $schema === "string" ? $schema : undefined,
      modules: isStringList(modules) ? modules : undefined,
      references: isStringList(references) ? references : undefined,
      identities: isStringList(identities) ? identities : undefined,
      output: typeof output === "string" ? output : undefined,
      strict: typeof strict === "boolean" ? strict : undefined,
    },
  };
};

const parseConfigText = (text: string): Result<unknown, string> => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Load genapi.json
 */
export const loadConfig = (
  configPath: string
): Result<GenapiConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  return flatMap(parseConfigText(readFileSync(configPath, "utf-8")), validateConfig);
};

/**
 * Find genapi.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find genapi.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Anchor a search path entry at a directory. Entries that start with an
 * environment variable are expanded later by the resolver and stay as written.
 */
const anchorEntry = (baseDir: string, entry: string): string =>
  isAbsolute(entry) || entry.startsWith("$") || entry.startsWith("%")
    ? entry
    : join(baseDir, entry);

/**
 * Resolve final configuration from file + CLI options.
 * File paths are relative to the project root, CLI paths to the working
 * directory.
 */
export const resolveConfig = (
  config: GenapiConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  modulePaths?: string,
  cwd: string = process.cwd()
): ResolvedConfig => {
  const fromFile = (entries: readonly string[] | undefined): readonly string[] =>
    (entries ?? []).map((entry) => anchorEntry(projectRoot, entry));
  const fromCli = (paths: string): readonly string[] =>
    splitSearchPath(paths).map((entry) => anchorEntry(cwd, entry));

  const output =
    cliOptions.out !== undefined
      ? resolve(cwd, cliOptions.out)
      : config.output !== undefined
        ? resolve(projectRoot, config.output)
        : undefined;

  return {
    projectRoot,
    modules:
      modulePaths !== undefined ? fromCli(modulePaths) : fromFile(config.modules),
    references:
      cliOptions.references !== undefined
        ? fromCli(cliOptions.references)
        : fromFile(config.references),
    identities: cliOptions.identities ?? config.identities ?? [],
    output,
    strict: cliOptions.strict ?? config.strict ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
