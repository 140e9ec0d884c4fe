/**
 * Type definitions for the genapi CLI
 */

export type { Result } from "@genapi/resolver";

/**
 * genapi.json
 */
export type GenapiConfig = {
  readonly $schema?: string;
  /** Module files or directories whose surface is written */
  readonly modules?: readonly string[];
  /** Files or directories probed for referenced modules */
  readonly references?: readonly string[];
  /** Additional module identities to resolve, as display strings */
  readonly identities?: readonly string[];
  /** Output file (default: standard output) */
  readonly output?: string;
  /** Fail when any module identity cannot be resolved */
  readonly strict?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  references?: string;
  out?: string;
  identities?: string[];
  strict?: boolean;
};

/**
 * Parsed command line
 */
export type ParsedArgs = {
  readonly command: string;
  readonly positionals: readonly string[];
  readonly options: CliOptions;
  /** Set when the command line cannot be understood */
  readonly error?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing genapi.json
  readonly modules: readonly string[];
  readonly references: readonly string[];
  readonly identities: readonly string[];
  readonly output: string | undefined;
  readonly strict: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
