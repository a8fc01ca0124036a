/**
 * Identifier engine: normalization and scoped hashing
 */

export * from "./normalize.js";
export * from "./id-generator.js";
