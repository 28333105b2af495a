/**
 * Combat - Engine Exports
 */

export * from "./status-registry";
export * from "./status-queries";
export * from "./status-ledger";
export * from "./unit-vitals";
export * from "./damage-calculator";
export * from "./initiative";
export * from "./energy-manager";
export * from "./turn-manager";
export * from "./unit-factory";
export * from "./attack-resolver";
export * from "./ability-executor";
export * from "./effect-dispatcher";
export * from "./event-bus";
export * from "./battle-session";
