// src/yaml-renderer.ts — Block-style YAML emitter with per-field flow style
// Values under a configured set of keys are rendered on one line
// (`fields: [a, b]`); everything else is block style with two-space
// indentation and sequences aligned with their parent key, the layout
// Looker itself exports. js-yaml serializes the scalars and the flow nodes.

import yaml from "js-yaml";
import type { YamlScalar, YamlValue } from "./types.js";
import { isYamlMap } from "./yaml-value.js";

export interface RenderOptions {
  /** Keys whose list or mapping value is rendered in flow style. */
  flowKeys: Iterable<string>;
}

type RenderNode =
  | { kind: "scalar"; value: YamlScalar }
  | { kind: "flow"; value: YamlValue }
  | { kind: "seq"; items: RenderNode[] }
  | { kind: "map"; entries: Array<[string, RenderNode]> };

const INDENT = 2;

/**
 * Render `value` as a YAML document body (no `---` separator).
 * Same input always yields the same text.
 */
export function renderYaml(value: YamlValue, options: RenderOptions): string {
  const node = markFlow(value, new Set(options.flowKeys));
  if (isInline(node)) return inline(node, "") + "\n";
  const lines = node.kind === "map" ? renderMap(node.entries, 0) : renderSeq(node.items, 0);
  return lines.join("\n") + "\n";
}

/** Tree walk that tags values under flow keys before anything is emitted. */
function markFlow(value: YamlValue, flowKeys: ReadonlySet<string>): RenderNode {
  if (Array.isArray(value)) {
    return { kind: "seq", items: value.map((item) => markFlow(item, flowKeys)) };
  }
  if (isYamlMap(value)) {
    const entries: Array<[string, RenderNode]> = Object.entries(value).map(([key, child]) => {
      const asFlow = flowKeys.has(key) && (Array.isArray(child) || isYamlMap(child));
      return [key, asFlow ? { kind: "flow", value: child } : markFlow(child, flowKeys)];
    });
    return { kind: "map", entries };
  }
  return { kind: "scalar", value };
}

function isInline(node: RenderNode): boolean {
  switch (node.kind) {
    case "scalar":
    case "flow":
      return true;
    case "seq":
      return node.items.length === 0;
    case "map":
      return node.entries.length === 0;
  }
}

function inline(node: RenderNode, pad: string): string {
  switch (node.kind) {
    case "scalar":
      return dumpScalar(node.value, pad);
    case "flow":
      return stripNewline(yaml.dump(node.value, { flowLevel: 0, lineWidth: -1 }));
    case "seq":
      return "[]";
    case "map":
      return "{}";
  }
}

function renderMap(entries: Array<[string, RenderNode]>, indent: number): string[] {
  const pad = " ".repeat(indent);
  const lines: string[] = [];
  for (const [key, child] of entries) {
    const renderedKey = dumpKey(key);
    if (isInline(child)) {
      lines.push(`${pad}${renderedKey}: ${inline(child, pad)}`);
    } else if (child.kind === "map") {
      lines.push(`${pad}${renderedKey}:`);
      lines.push(...renderMap(child.entries, indent + INDENT));
    } else if (child.kind === "seq") {
      lines.push(`${pad}${renderedKey}:`);
      lines.push(...renderSeq(child.items, indent));
    }
  }
  return lines;
}

function renderSeq(items: RenderNode[], indent: number): string[] {
  const pad = " ".repeat(indent);
  const lines: string[] = [];
  for (const item of items) {
    if (isInline(item)) {
      lines.push(`${pad}- ${inline(item, pad)}`);
      continue;
    }
    const nested =
      item.kind === "map"
        ? renderMap(item.entries, indent + INDENT)
        : item.kind === "seq"
          ? renderSeq(item.items, indent + INDENT)
          : [];
    if (nested.length === 0) continue;
    // The first nested line shares the row with the dash.
    nested[0] = `${pad}- ${nested[0].slice(indent + INDENT)}`;
    lines.push(...nested);
  }
  return lines;
}

/**
 * Keys are written the YAML 1.2 way: `y`, `n` or `on` as a key stays bare.
 * Values keep js-yaml's 1.1 quoting so `'yes'` never reads back as a boolean.
 */
function dumpKey(key: string): string {
  return stripNewline(yaml.dump(key, { lineWidth: -1, noCompatMode: true }));
}

/**
 * Serialize a scalar. Multi-line strings come back from js-yaml as a
 * literal block whose body is indented relative to column 0, so the body
 * is shifted under the owning line.
 */
function dumpScalar(value: YamlScalar, pad: string): string {
  const [first, ...rest] = stripNewline(yaml.dump(value, { lineWidth: -1 })).split("\n");
  if (rest.length === 0) return first;
  return [first, ...rest.map((line) => (line.length > 0 ? pad + line : line))].join("\n");
}

function stripNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}
