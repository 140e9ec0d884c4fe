/**
 * @genapi/resolver - module identities, metadata reading and resolution
 */

export * from "./types/result.js";
export * from "./types/diagnostic.js";
export * from "./types/module.js";
export * from "./identity.js";
export * from "./identity-matcher.js";
export * from "./type-reference.js";
export * from "./module-reader.js";
export * from "./symbol-universe.js";
export * from "./env.js";
export * from "./reference-resolver.js";
