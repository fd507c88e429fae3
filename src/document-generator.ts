// src/document-generator.ts — Standalone and extends dashboard documents

import type { DashboardDocument, DashboardRecord, YamlMap } from "./types.js";
import { renderYaml } from "./yaml-renderer.js";
import { MODEL_PLACEHOLDER, substituteModelReference } from "./text-preprocessor.js";

/** Fields LookML conventionally writes on a single line. */
export const DEFAULT_FLOW_FIELDS: readonly string[] = [
  "extends",
  "fields",
  "sorts",
  "listens_to_filters",
  "listen",
];

const DOCUMENT_SEPARATOR = "---\n";

export interface GenerateOptions {
  flowFields?: readonly string[];
}

export interface ExtendsInput {
  dashboardName: string;
  tenantName: string;
  baseName: string;
  elements: DashboardRecord[];
  filters: DashboardRecord[];
  /** Falls back to "<baseName> - <tenantName>" when empty. */
  title?: string;
  /** Literal model name; the `@{model_name}` constant is used when absent. */
  tenantModel?: string;
}

/**
 * Re-serialize a whole parsed dashboard, pointing its model references at
 * `tenantModel` (or the `@{model_name}` constant).
 */
export function generateStandalone(
  document: DashboardDocument,
  tenantModel?: string,
  options: GenerateOptions = {},
): string {
  return finish([document.raw], tenantModel, options);
}

/**
 * Build a dashboard that extends `baseName` and carries only the given
 * elements and filters. Empty lists are left out entirely.
 */
export function generateExtends(input: ExtendsInput, options: GenerateOptions = {}): string {
  const dashboard: YamlMap = {
    dashboard: input.dashboardName,
    title: input.title || `${input.baseName} - ${input.tenantName}`,
    extends: [input.baseName],
  };
  if (input.elements.length > 0) dashboard.elements = input.elements;
  if (input.filters.length > 0) dashboard.filters = input.filters;

  return finish([dashboard], input.tenantModel, options);
}

function finish(body: YamlMap[], tenantModel: string | undefined, options: GenerateOptions): string {
  let output = renderYaml(body, { flowKeys: options.flowFields ?? DEFAULT_FLOW_FIELDS });
  if (!output.startsWith(DOCUMENT_SEPARATOR)) output = DOCUMENT_SEPARATOR + output;
  return substituteModelReference(output, tenantModel || MODEL_PLACEHOLDER);
}
