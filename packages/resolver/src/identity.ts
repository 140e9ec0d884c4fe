/**
 * Module identity parsing and formatting
 *
 * Display form: `Name, Version=1.2.0.0, Culture=neutral, PublicKeyToken=b77a5c561934e089`
 */

import type { Result } from "./types/result.js";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type { ModuleIdentity, ModuleVersion } from "./types/module.js";

export const ZERO_VERSION: ModuleVersion = [0, 0, 0, 0];

const VERSION_PART = /^\d+$/;
const MAX_VERSION_PART = 65535;
const HEX_TOKEN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Parse "1.2" / "1.2.0.0" into a four-part version. Missing parts are zero;
 * each part is a 16-bit unsigned value.
 */
export const parseVersion = (text: string): ModuleVersion | undefined => {
  const parts = text.trim().split(".");
  if (parts.length === 0 || parts.length > 4) {
    return undefined;
  }

  const numbers: number[] = [];
  for (const part of parts) {
    if (!VERSION_PART.test(part)) {
      return undefined;
    }
    const value = Number(part);
    if (value > MAX_VERSION_PART) {
      return undefined;
    }
    numbers.push(value);
  }

  const [major = 0, minor = 0, build = 0, revision = 0] = numbers;
  return [major, minor, build, revision];
};

export const formatVersion = (version: ModuleVersion): string =>
  version.join(".");

export const versionsEqual = (a: ModuleVersion, b: ModuleVersion): boolean =>
  a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];

/**
 * Ordinal comparison, most significant part first.
 */
export const compareVersions = (a: ModuleVersion, b: ModuleVersion): number => {
  for (let i = 0; i < 4; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
};

/**
 * Lowercase hex, two digits per byte, no separators.
 * An identity without a key renders as the empty string.
 */
export const formatPublicKeyToken = (token: Uint8Array | undefined): string => {
  if (token === undefined) {
    return "";
  }
  let text = "";
  for (const byte of token) {
    text += byte.toString(16).padStart(2, "0");
  }
  return text;
};

export const parsePublicKeyToken = (text: string): Uint8Array | undefined => {
  const trimmed = text.trim();
  if (!HEX_TOKEN.test(trimmed)) {
    return undefined;
  }
  const bytes = new Uint8Array(trimmed.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(trimmed.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
};

export const publicKeyTokensEqual = (
  a: Uint8Array | undefined,
  b: Uint8Array | undefined
): boolean => formatPublicKeyToken(a) === formatPublicKeyToken(b);

export const createIdentity = (
  name: string,
  version: ModuleVersion = ZERO_VERSION,
  publicKeyToken?: Uint8Array
): ModuleIdentity =>
  publicKeyToken === undefined || publicKeyToken.length === 0
    ? { name, version }
    : { name, version, publicKeyToken };

/**
 * Parse a display string. The name is required; Version, Culture and
 * PublicKeyToken are optional, in any order.
 */
export const parseIdentity = (
  text: string
): Result<ModuleIdentity, Diagnostic> => {
  const invalid = (reason: string): Result<ModuleIdentity, Diagnostic> => ({
    ok: false,
    error: createDiagnostic(
      "GEN3001",
      "error",
      `Invalid module identity '${text}': ${reason}`,
      undefined,
      "Expected 'Name, Version=1.0.0.0, PublicKeyToken=null'"
    ),
  });

  const [rawName = "", ...properties] = text.split(",");
  const name = rawName.trim();
  if (name === "") {
    return invalid("missing name");
  }

  let version: ModuleVersion = ZERO_VERSION;
  let publicKeyToken: Uint8Array | undefined;

  for (const property of properties) {
    const eq = property.indexOf("=");
    if (eq < 0) {
      return invalid(`expected key=value, got '${property.trim()}'`);
    }
    const key = property.slice(0, eq).trim().toLowerCase();
    const value = property.slice(eq + 1).trim();

    switch (key) {
      case "version": {
        const parsed = parseVersion(value);
        if (!parsed) {
          return invalid(`bad version '${value}'`);
        }
        version = parsed;
        break;
      }
      case "publickeytoken": {
        if (value.toLowerCase() === "null") {
          publicKeyToken = undefined;
          break;
        }
        const parsed = parsePublicKeyToken(value);
        if (!parsed) {
          return invalid(`bad public key token '${value}'`);
        }
        publicKeyToken = parsed;
        break;
      }
      case "culture":
        break;
      default:
        return invalid(`unknown property '${property.slice(0, eq).trim()}'`);
    }
  }

  return { ok: true, value: createIdentity(name, version, publicKeyToken) };
};

export const formatIdentity = (identity: ModuleIdentity): string => {
  const token = formatPublicKeyToken(identity.publicKeyToken);
  return [
    identity.name,
    `Version=${formatVersion(identity.version)}`,
    "Culture=neutral",
    `PublicKeyToken=${token === "" ? "null" : token}`,
  ].join(", ");
};
