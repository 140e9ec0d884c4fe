/**
 * @genapi/emitter - C# skeleton source from module symbols
 */

export * from "./syntax/types.js";
export * from "./syntax/factory.js";
export * from "./syntax/printer.js";
export { normalizeWhitespace } from "./syntax/normalize.js";
export { rewriteDeclaration } from "./rewriter.js";
export * from "./type-syntax.js";
export * from "./synthesizer.js";
export * from "./surface-walker.js";
