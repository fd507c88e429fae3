// src/normalizer.ts — Dashboard parsing and comparison normalization

import yaml from "js-yaml";
import type { DashboardDocument, DashboardRecord, NoisyDefaults, YamlMap, YamlValue } from "./types.js";
import { ParseError } from "./types.js";
import { isYamlMap, toYamlValue, yamlEqual } from "./yaml-value.js";

/** Keys Looker regenerates on every export. */
export const VOLATILE_KEYS = ["id", "slug", "preferred_slug"] as const;
const volatileKeys: ReadonlySet<string> = new Set(VOLATILE_KEYS);

/**
 * Values the Looker API fills in on export that hand-written base
 * dashboards usually leave out. A key is only dropped when it carries
 * exactly this value.
 */
export const NOISY_DEFAULTS: NoisyDefaults = {
  show_view_names: false,
  show_comparison: false,
  comparison_type: "value",
  comparison_reverse_colors: false,
  show_comparison_label: true,
  enable_conditional_formatting: false,
  conditional_formatting_include_totals: false,
  conditional_formatting_include_nulls: false,
  defaults_version: 1,
  tab_name: "",
  hidden: false,
  transpose: false,
  truncate_text: true,
  hide_totals: false,
  hide_row_totals: false,
  size_to_fit: true,
  row: null,
  col: null,
  width: null,
  height: null,
};

/**
 * Parse dashboard markup. A top-level list yields its first dashboard; an
 * empty document yields an empty DashboardDocument.
 */
export function parseDashboard(text: string): DashboardDocument {
  let loaded: unknown;
  try {
    loaded = yaml.load(text, { schema: yaml.CORE_SCHEMA });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Dashboard markup is not valid YAML: ${msg}`, err);
  }

  let top = toYamlValue(loaded);
  if (Array.isArray(top)) top = top.length > 0 ? top[0] : null;
  if (top === null) return { elements: [], filters: [], raw: {} };
  if (!isYamlMap(top)) {
    throw new ParseError("Dashboard markup must contain a mapping at the top level");
  }

  return {
    name: stringField(top, "dashboard"),
    title: stringField(top, "title"),
    model: stringField(top, "model"),
    elements: recordList(top, "elements"),
    filters: recordList(top, "filters"),
    raw: top,
  };
}

/**
 * Shallow copy of `record` without volatile keys, without `model` when
 * `removeModelRef` is set, and without keys equal to their noisy default.
 */
export function normalizeRecord(
  record: DashboardRecord,
  removeModelRef: boolean,
  noisyDefaults: NoisyDefaults = NOISY_DEFAULTS,
): YamlMap {
  const normalized: YamlMap = {};
  for (const [key, value] of Object.entries(record)) {
    if (volatileKeys.has(key)) continue;
    if (removeModelRef && key === "model") continue;
    if (Object.hasOwn(noisyDefaults, key) && yamlEqual(value, noisyDefaults[key])) continue;
    normalized[key] = value;
  }
  return normalized;
}

function stringField(map: YamlMap, key: string): string | undefined {
  const value = map[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function recordList(map: YamlMap, key: string): DashboardRecord[] {
  const value: YamlValue | undefined = map[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ParseError(`Dashboard field "${key}" must be a list`);
  }
  return value.map((item, i) => {
    if (!isYamlMap(item)) {
      throw new ParseError(`Dashboard field "${key}" item ${i} must be a mapping`);
    }
    return item;
  });
}
