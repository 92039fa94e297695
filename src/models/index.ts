/**
 * Domain Models
 */

export * from "./error-codes";
export * from "./errors";
export * from "./limits";
export * from "./clipboard-item";
export * from "./pinned-item";
export * from "./snippet";
export * from "./settings";
export * from "./backup";
export * from "./result";
export * from "./command-args";
