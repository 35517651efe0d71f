/**
 * @pseudolex/shared-types - data model, error taxonomy, logging, fixtures.
 */
export * from "./schema.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./fixtures.js";
