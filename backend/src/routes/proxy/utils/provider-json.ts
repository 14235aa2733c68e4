/**
 * Typed reads from opaque provider JSON. Provider payloads are not validated
 * beyond what a Strategy needs, so every read narrows at the point of use.
 */
import { get } from "lodash-es";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readValue(source: unknown, path: string): unknown {
  const value: unknown = get(source, path);
  return value;
}

export function readString(source: unknown, path: string): string | undefined {
  const value = readValue(source, path);
  return typeof value === "string" ? value : undefined;
}

export function readNumber(source: unknown, path: string): number | undefined {
  const value = readValue(source, path);
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

export function readArray(source: unknown, path: string): unknown[] {
  const value = readValue(source, path);
  return Array.isArray(value) ? value : [];
}

export function readRecord(
  source: unknown,
  path: string,
): Record<string, unknown> | undefined {
  const value = readValue(source, path);
  return isRecord(value) ? value : undefined;
}

/**
 * Token counts arrive either as a number or as the token list itself
 */
export function readTokenCount(source: unknown, path: string): number {
  const value = readValue(source, path);
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.length;
  }
  return 0;
}
