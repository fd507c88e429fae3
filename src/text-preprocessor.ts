// src/text-preprocessor.ts — Line-level cleanup of raw dashboard markup
// Works on text only; nothing here parses the markup.

import { ParseError } from "./types.js";

export const MODEL_PLACEHOLDER = "@{model_name}";

// Dashboard-level keys sit at 2–4 columns. Anything deeper belongs to an
// element and is left for the normalizer.
const VOLATILE_LINE = /^[ \t]{2,4}(?:id|slug|preferred_slug)[ \t]*:/;

// A `model:` key at the start of a line (optionally the first key of a
// sequence item) followed by a double-quoted, single-quoted, placeholder or
// bare value.
const MODEL_VALUE =
  /^([ \t]*(?:-[ \t]+)?model:[ \t]*)(?:"[^"\n]*"|'[^'\n]*'|@\{[^}\n]*\}|[\w.@{}-]+)/;

// `key: |` / `- key: >-` and bare `- |` openers of a block scalar. Group 1 is
// the text before the key (or before the dash), whose width is the owner's
// column; body lines are indented past it.
const KEYED_BLOCK_SCALAR = /^([ \t]*(?:-[ \t]+)*)[^\s#-][^\n]*?:[ \t]+[|>][-+1-9]*[ \t]*$/;
const ITEM_BLOCK_SCALAR = /^([ \t]*)-[ \t]+[|>][-+1-9]*[ \t]*$/;

const DASHBOARD_DECLARATION = /^-[ \t]+dashboard:[ \t]+(\S+)/m;

/**
 * Remove dashboard-level `id`, `slug` and `preferred_slug` lines so Looker
 * keeps its own values when the file is imported.
 */
export function stripVolatileFields(text: string): string {
  return text
    .split("\n")
    .filter((line) => !VOLATILE_LINE.test(line))
    .join("\n");
}

/**
 * Point every `model:` reference at `target`. A `@{...}` target is written
 * bare unless `quote` is set; any other target is written double-quoted.
 * Bare placeholders are not valid YAML, so files that are parsed again
 * later (base dashboards) should quote them. Lines inside `|` and `>` block
 * scalars are text, not keys, and are left alone.
 */
export function substituteModelReference(
  text: string,
  target: string = MODEL_PLACEHOLDER,
  quote = !target.startsWith("@{"),
): string {
  const replacement = quote ? `"${target}"` : target;
  let blockOwner: number | null = null;

  return text
    .split("\n")
    .map((line) => {
      if (blockOwner !== null) {
        if (line.trim() === "" || leadingWidth(line) > blockOwner) return line;
        blockOwner = null;
      }
      const opener = KEYED_BLOCK_SCALAR.exec(line) ?? ITEM_BLOCK_SCALAR.exec(line);
      if (opener) {
        blockOwner = opener[1].length;
        return line;
      }
      return line.replace(MODEL_VALUE, (_match, prefix: string) => `${prefix}${replacement}`);
    })
    .join("\n");
}

function leadingWidth(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Read the `- dashboard: <name>` declaration from raw markup.
 */
export function extractDashboardName(text: string): string {
  const match = DASHBOARD_DECLARATION.exec(text);
  if (!match) {
    throw new ParseError("Could not detect the dashboard name (expected a '- dashboard: <name>' line)");
  }
  return match[1];
}
