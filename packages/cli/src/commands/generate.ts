/**
 * genapi generate - write the public surface of modules as C# source
 */

import {
  createDiagnostic,
  formatDiagnostic,
  formatIdentity,
  type ModuleSymbol,
} from "@genapi/resolver";
import {
  createDeclarationSynthesizer,
  createSourceWriter,
  type DeclarationSynthesizer,
  type SynthesizerOptions,
} from "@genapi/emitter";
import type { ResolvedConfig, Result } from "../types.js";
import { withOutput } from "../output.js";
import {
  createResolutionSession,
  distinctIdentities,
  joinSearchPath,
  parseIdentities,
  reportUniverseDiagnostics,
} from "./resolution.js";

export type GenerateSummary = {
  readonly modules: readonly ModuleSymbol[];
  readonly unresolved: number;
};

export type GenerateOptions = {
  /** Builds the per-type synthesizer; defaults to the C# skeleton synthesizer */
  readonly createSynthesizer?: (options: SynthesizerOptions) => DeclarationSynthesizer;
};

/**
 * Load the subject modules, resolve their references and the configured
 * identities, then write every subject's surface to the output.
 */
export const generateCommand = (
  config: ResolvedConfig,
  options: GenerateOptions = {}
): Result<GenerateSummary, string> => {
  // Progress must not mix with source written to stdout
  const log = (message: string): void => {
    if (config.quiet) return;
    if (config.output === undefined) {
      console.error(message);
    } else {
      console.log(message);
    }
  };

  const identities = parseIdentities(config.identities);
  if (!identities.ok) {
    identities.error.forEach((d) => console.error(formatDiagnostic(d)));
    return { ok: false, error: "Invalid module identities" };
  }

  const session = createResolutionSession();
  const { resolver } = session;

  const subjects = resolver.loadModules(joinSearchPath(config.modules));
  resolver.registerSearchPath(joinSearchPath(config.references));

  if (config.verbose) {
    log(`Search directories: ${resolver.searchDirectories.join(", ")}`);
  }

  resolver.resolve(
    distinctIdentities([
      ...identities.value,
      ...subjects.flatMap((module) => module.references),
    ])
  );

  if (reportUniverseDiagnostics(session)) {
    return { ok: false, error: "Module files could not be read" };
  }

  if (subjects.length === 0) {
    console.error(
      formatDiagnostic(
        createDiagnostic(
          "GEN3002",
          "error",
          `No modules found in '${joinSearchPath(config.modules)}'.`,
          undefined,
          "Pass module files or directories that contain them"
        )
      )
    );
    return { ok: false, error: "Nothing to generate" };
  }

  const unresolved = session.unresolvedCount();
  if (config.strict && unresolved > 0) {
    return {
      ok: false,
      error: `${unresolved} module identit${unresolved === 1 ? "y" : "ies"} could not be resolved (strict)`,
    };
  }

  const createSynthesizer =
    options.createSynthesizer ?? createDeclarationSynthesizer;
  const synthesize = createSynthesizer({ host: session.universe.host });

  // Render everything first so a failure leaves the output untouched
  const chunks: string[] = [];
  const writer = createSourceWriter(
    { write: (text) => chunks.push(text) },
    { synthesize }
  );
  for (const module of subjects) {
    if (config.verbose) {
      log(`  ${formatIdentity(module.identity)} (${module.filePath})`);
    }
    writer.writeModule(module);
  }

  const written = withOutput(config.output, (sink) => {
    sink.write(chunks.join(""));
    return sink.description;
  });

  log(
    `✓ Wrote ${subjects.length} module${subjects.length === 1 ? "" : "s"} to ${written}`
  );

  return { ok: true, value: { modules: subjects, unresolved } };
};
