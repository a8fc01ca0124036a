/**
 * Graph assembly and validation
 *
 * @module
 */

export { GraphAccumulator, compareIds } from "./graph-accumulator.js";
export { validateGraph, assertGraphValid, countEntities, type ValidateOptions } from "./graph-validator.js";
export type * from "./models/findings.js";
