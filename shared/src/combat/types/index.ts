/**
 * Combat - Type Exports
 */

export * from "./unit";
export * from "./status-effects";
export * from "./config";
export * from "./damage";
export * from "./turn";
export * from "./events";
export * from "./follow-ups";
export * from "./collaborators";
