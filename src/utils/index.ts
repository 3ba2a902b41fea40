/**
 * Utility functions
 */

export * from "./error-mapping.js";
export * from "./sensitive-data.js";
