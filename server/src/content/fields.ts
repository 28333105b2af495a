// Field readers for loaded YAML/JSON documents. Each one narrows an
// unknown value or throws an Error naming where in the file it failed.

import fs from "fs";
import path from "path";
import yaml from "js-yaml";

export type Fields = Record<string, unknown>;

export function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readDocument(filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  const raw = fs.readFileSync(filePath, "utf8");
  if (ext === ".yaml" || ext === ".yml") {
    return yaml.load(raw);
  }
  if (ext === ".json") {
    return JSON.parse(raw);
  }
  throw new Error(`Unsupported content file extension: ${ext}`);
}

export function expectRecord(value: unknown, where: string): Fields {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }
  return value;
}

export function expectArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${where} must be an array`);
  }
  return value;
}

export function expectString(value: unknown, where: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${where} must be a non-empty string`);
  }
  return value;
}

export function expectNumber(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where} must be a number`);
  }
  return value;
}

export function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : expectString(value, where);
}

export function optionalNumber(value: unknown, where: string): number | undefined {
  return value === undefined ? undefined : expectNumber(value, where);
}

export function expectOneOf<T extends string>(value: unknown, options: readonly T[], where: string): T {
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new Error(`${where} must be one of ${options.join(", ")} (got ${String(value)})`);
  }
  return match;
}

export function rejectUnknownKeys(record: Fields, allowed: readonly string[], where: string): void {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      throw new Error(`${where}: unknown field "${key}"`);
    }
  }
}
