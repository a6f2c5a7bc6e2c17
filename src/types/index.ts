/**
 * Shared types and helpers.
 */

export * from "./organization.js";
export * from "./dates.js";
