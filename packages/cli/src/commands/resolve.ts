/**
 * genapi resolve - map module identities to module files
 */

import { formatDiagnostic, formatIdentity, type ModuleSymbol } from "@genapi/resolver";
import type { ResolvedConfig, Result } from "../types.js";
import {
  createResolutionSession,
  joinSearchPath,
  parseIdentities,
  reportUniverseDiagnostics,
} from "./resolution.js";

/**
 * Format one resolved module for output
 */
export const formatResolvedModule = (module: ModuleSymbol): string =>
  `${formatIdentity(module.identity)} => ${module.filePath}`;

/**
 * Resolve the configured identities against modules and references, printing
 * one line per resolved module.
 */
export const resolveCommand = (
  config: ResolvedConfig
): Result<readonly ModuleSymbol[], string> => {
  const identities = parseIdentities(config.identities);
  if (!identities.ok) {
    identities.error.forEach((d) => console.error(formatDiagnostic(d)));
    return { ok: false, error: "Invalid module identities" };
  }

  const session = createResolutionSession();
  const { resolver } = session;
  resolver.registerSearchPath(joinSearchPath(config.modules));
  resolver.registerSearchPath(joinSearchPath(config.references));

  const resolved = resolver.resolve(identities.value);
  resolved.map(formatResolvedModule).forEach((line) => console.log(line));

  if (reportUniverseDiagnostics(session)) {
    return { ok: false, error: "Module files could not be read" };
  }

  const unresolved = session.unresolvedCount();
  if (unresolved > 0) {
    return {
      ok: false,
      error: `${unresolved} of ${identities.value.length} module identities could not be resolved`,
    };
  }

  if (config.verbose && !config.quiet) {
    console.log(`Search directories: ${resolver.searchDirectories.join(", ")}`);
  }

  return { ok: true, value: resolved };
};
