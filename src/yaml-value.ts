// src/yaml-value.ts — Closed value model for parsed dashboard markup
// Everything js-yaml hands back is converted into YamlValue so that
// normalization and comparison are total over scalars, lists and maps.

import type { YamlMap, YamlValue } from "./types.js";
import { ParseError } from "./types.js";

export function isYamlMap(value: YamlValue | undefined): value is YamlMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a parsed YAML value into the closed YamlValue union.
 * Throws ParseError for anything outside it (functions, dates, binary).
 */
export function toYamlValue(input: unknown, path = "$"): YamlValue {
  if (input === null || input === undefined) return null;
  if (typeof input === "string" || typeof input === "boolean") return input;
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new ParseError(`Unsupported non-finite number at ${path}`);
    }
    return input;
  }
  if (Array.isArray(input)) {
    return input.map((item, i) => toYamlValue(item, `${path}[${i}]`));
  }
  if (typeof input === "object" && Object.getPrototypeOf(input) === Object.prototype) {
    const map: YamlMap = {};
    for (const [key, value] of Object.entries(input)) {
      map[key] = toYamlValue(value, `${path}.${key}`);
    }
    return map;
  }
  throw new ParseError(`Unsupported value of type ${typeof input} at ${path}`);
}

/**
 * Structural equality. Map key order is ignored, list order is not.
 */
export function yamlEqual(a: YamlValue, b: YamlValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => yamlEqual(item, b[i]));
  }
  if (isYamlMap(a)) {
    if (!isYamlMap(b)) return false;
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => Object.hasOwn(b, key) && yamlEqual(a[key], b[key]));
  }
  return false;
}

/** The identity of an element or filter, or undefined when it has none. */
export function recordName(record: YamlMap): string | undefined {
  const name = record.name;
  if (typeof name === "string") return name.length > 0 ? name : undefined;
  if (typeof name === "number") return String(name);
  return undefined;
}
