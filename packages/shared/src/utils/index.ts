/**
 * Shared utility functions for attested-chat
 */

export * from "./encoding.js";
export * from "./logger.js";
export * from "./serial-queue.js";
