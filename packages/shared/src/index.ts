/**
 * Shared types and utilities for attested-chat
 *
 * Error taxonomy, logging and the encoding/hash primitives used by the client
 * package and its CLI.
 */

export * from "./types/index.js";
export * from "./utils/index.js";
export * from "./errors/api-error.js";
