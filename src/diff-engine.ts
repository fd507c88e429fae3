// src/diff-engine.ts — Tenant vs. base comparison of elements and filters
// A tenant record is NEW when the base has no record of that name, MODIFIED
// when the normalized records differ, and INHERITED (left out) otherwise.

import type { DashboardRecord, DiffEntry, DiffResult, NoisyDefaults } from "./types.js";
import { NOISY_DEFAULTS, normalizeRecord } from "./normalizer.js";
import { recordName, yamlEqual } from "./yaml-value.js";

/**
 * Compare tenant elements against base elements.
 * Output keeps the tenant's order and original (non-normalized) records.
 */
export function diffElements(
  tenantElements: DashboardRecord[],
  baseElements: DashboardRecord[],
  noisyDefaults: NoisyDefaults = NOISY_DEFAULTS,
): DiffResult {
  return diffRecords(tenantElements, baseElements, noisyDefaults);
}

/**
 * Compare tenant filters against base filters. Same rules as elements,
 * separate namespace.
 */
export function diffFilters(
  tenantFilters: DashboardRecord[],
  baseFilters: DashboardRecord[],
  noisyDefaults: NoisyDefaults = NOISY_DEFAULTS,
): DiffResult {
  return diffRecords(tenantFilters, baseFilters, noisyDefaults);
}

function diffRecords(
  tenant: DashboardRecord[],
  base: DashboardRecord[],
  noisyDefaults: NoisyDefaults,
): DiffResult {
  // Duplicate names: the last base record wins.
  const baseByName = new Map<string, DashboardRecord>();
  for (const record of base) {
    const name = recordName(record);
    if (name !== undefined) baseByName.set(name, record);
  }

  const entries: DiffEntry[] = [];
  const inherited: string[] = [];

  for (const record of tenant) {
    const name = recordName(record);
    const baseRecord = name === undefined ? undefined : baseByName.get(name);

    if (name === undefined || baseRecord === undefined) {
      entries.push({ name, change: "new", record });
      continue;
    }

    const tenantNorm = normalizeRecord(record, true, noisyDefaults);
    const baseNorm = normalizeRecord(baseRecord, true, noisyDefaults);
    if (yamlEqual(tenantNorm, baseNorm)) {
      inherited.push(name);
    } else {
      entries.push({ name, change: "modified", record });
    }
  }

  return { entries, inherited };
}

/** The records a generated extends document should carry. */
export function changedRecords(diff: DiffResult): DashboardRecord[] {
  return diff.entries.map((entry) => entry.record);
}

/**
 * One-line summary for progress output.
 */
export function summarizeDiff(
  elements: DiffResult,
  filters: DiffResult,
  baseElementCount: number,
): string {
  const count = (diff: DiffResult, change: DiffEntry["change"]) =>
    diff.entries.filter((e) => e.change === change).length;
  const totalElements = elements.entries.length + elements.inherited.length;

  return (
    `Elements: ${totalElements} total, ${baseElementCount} base, ` +
    `${count(elements, "new")} new, ${count(elements, "modified")} modified, ${elements.inherited.length} inherited. ` +
    `Filters: ${count(filters, "new")} new, ${count(filters, "modified")} modified, ${filters.inherited.length} inherited.`
  );
}
