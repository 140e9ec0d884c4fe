/**
 * Identity matcher - classifies modules already bound under a requested name.
 *
 * Pure: performs no loading. A name match always resolves; version and key
 * differences only produce notices.
 */

import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type { ModuleIdentity, ModuleSymbol } from "./types/module.js";
import {
  compareVersions,
  formatPublicKeyToken,
  formatVersion,
  publicKeyTokensEqual,
  versionsEqual,
} from "./identity.js";

export type MismatchNotice = {
  readonly kind: "version" | "publicKeyToken";
  readonly name: string;
  readonly found: string;
  readonly requested: string;
};

export type MatchResult =
  | { readonly kind: "unresolved"; readonly requested: ModuleIdentity }
  | {
      readonly kind: "resolved";
      readonly module: ModuleSymbol;
      readonly notices: readonly MismatchNotice[];
    };

const pickCandidate = (
  requested: ModuleIdentity,
  candidates: readonly ModuleSymbol[]
): ModuleSymbol | undefined => {
  const exact = candidates.find(
    (m) =>
      versionsEqual(m.identity.version, requested.version) &&
      publicKeyTokensEqual(m.identity.publicKeyToken, requested.publicKeyToken)
  );
  if (exact) {
    return exact;
  }

  const sameVersion = candidates.find((m) =>
    versionsEqual(m.identity.version, requested.version)
  );
  if (sameVersion) {
    return sameVersion;
  }

  // Highest version; ties keep bind order
  return candidates.reduce<ModuleSymbol | undefined>(
    (best, m) =>
      best === undefined ||
      compareVersions(m.identity.version, best.identity.version) > 0
        ? m
        : best,
    undefined
  );
};

/**
 * Classify the best module bound under `requested.name`.
 *
 * @param candidates - Modules bound under the requested name, in bind order
 */
export const matchIdentity = (
  requested: ModuleIdentity,
  candidates: readonly ModuleSymbol[]
): MatchResult => {
  const named = candidates.filter((m) => m.identity.name === requested.name);
  const module = pickCandidate(requested, named);
  if (!module) {
    return { kind: "unresolved", requested };
  }

  const notices: MismatchNotice[] = [];
  const found = module.identity;

  if (!versionsEqual(found.version, requested.version)) {
    notices.push({
      kind: "version",
      name: requested.name,
      found: formatVersion(found.version),
      requested: formatVersion(requested.version),
    });
  }

  const foundToken = formatPublicKeyToken(found.publicKeyToken);
  const requestedToken = formatPublicKeyToken(requested.publicKeyToken);
  if (foundToken !== requestedToken) {
    notices.push({
      kind: "publicKeyToken",
      name: requested.name,
      found: foundToken,
      requested: requestedToken,
    });
  }

  return { kind: "resolved", module, notices };
};

export const noticeToDiagnostic = (notice: MismatchNotice): Diagnostic => {
  switch (notice.kind) {
    case "version":
      return createDiagnostic(
        "GEN2001",
        "warning",
        `Found '${notice.name}' with version '${notice.found}' instead of '${notice.requested}'.`
      );
    case "publicKeyToken":
      return createDiagnostic(
        "GEN2002",
        "warning",
        `Found '${notice.name}' with PublicKeyToken '${notice.found}' instead of '${notice.requested}'.`
      );
  }
};
