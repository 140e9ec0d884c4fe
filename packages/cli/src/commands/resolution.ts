/**
 * Shared setup for commands that resolve modules
 */

import {
  createMetadataReader,
  createReferenceResolver,
  createSymbolUniverse,
  error,
  formatDiagnostic,
  formatIdentity,
  ok,
  parseIdentity,
  type Diagnostic,
  type ModuleIdentity,
  type ReferenceResolver,
  type Result,
  type SymbolUniverse,
} from "@genapi/resolver";

export type ResolutionSession = {
  readonly universe: SymbolUniverse;
  readonly resolver: ReferenceResolver;
  /** Unresolved-identity notices reported so far */
  readonly unresolvedCount: () => number;
};

/**
 * Create a universe and resolver whose notices are reported on stderr
 */
export const createResolutionSession = (): ResolutionSession => {
  let unresolved = 0;
  const universe = createSymbolUniverse();
  const resolver = createReferenceResolver(universe, createMetadataReader(), {
    onNotice: (notice) => {
      if (notice.code === "GEN2003") {
        unresolved++;
      }
      console.error(formatDiagnostic(notice));
    },
  });
  return { universe, resolver, unresolvedCount: () => unresolved };
};

/**
 * Parse identity display strings, reporting every invalid one
 */
export const parseIdentities = (
  texts: readonly string[]
): Result<readonly ModuleIdentity[], readonly Diagnostic[]> => {
  const identities: ModuleIdentity[] = [];
  const errors: Diagnostic[] = [];
  for (const text of texts) {
    const parsed = parseIdentity(text);
    if (parsed.ok) {
      identities.push(parsed.value);
    } else {
      errors.push(parsed.error);
    }
  }
  return errors.length > 0 ? error(errors) : ok(identities);
};

/**
 * Drop repeated identities, keeping the first occurrence
 */
export const distinctIdentities = (
  identities: readonly ModuleIdentity[]
): readonly ModuleIdentity[] => {
  const seen = new Set<string>();
  return identities.filter((identity) => {
    const key = formatIdentity(identity);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

/**
 * Print universe diagnostics; true when there were any
 */
export const reportUniverseDiagnostics = (session: ResolutionSession): boolean => {
  const { hasDiagnostics, diagnostics } = session.resolver.hasDiagnostics();
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
  return hasDiagnostics;
};

/**
 * Join search path entries for the resolver
 */
export const joinSearchPath = (entries: readonly string[]): string =>
  entries.join(";");
