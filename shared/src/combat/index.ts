/**
 * Combat - Main Export
 *
 * Turn-based squad combat: damage, status effects, initiative and turn flow.
 */

export * from "./types";
export * from "./engine";
export * from "./validation";
