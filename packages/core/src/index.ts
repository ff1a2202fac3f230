/**
 * @lexembed/core -- shared types, ports, errors and numeric helpers.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./matrix.js";
export * from "./precision.js";
export * from "./config.js";
export { SeededRng, shuffle } from "./rng.js";
export { Registry } from "./registry.js";
export { languages, getLanguage, textModelParams, type LanguageConfig } from "./languages.js";
