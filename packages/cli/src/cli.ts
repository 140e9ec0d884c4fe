/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export {
  generateCommand,
  type GenerateOptions,
  type GenerateSummary,
} from "./commands/generate.js";
export { resolveCommand, formatResolvedModule } from "./commands/resolve.js";
export { withOutput, type OutputSink } from "./output.js";
