import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseDashboard, normalizeRecord, NOISY_DEFAULTS } from "../src/normalizer.js";
import { ParseError } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

describe("parseDashboard", () => {
  it("parses a Looker export into a document", () => {
    const doc = parseDashboard(readFileSync(FIXTURES + "sales_overview_tenant_1.lookml", "utf-8"));
    expect(doc.name).toBe("sales_overview_tenant_1");
    expect(doc.title).toBe("Sales Overview");
    expect(doc.elements.map((e) => e.name)).toEqual(["revenue", "orders_by_region", "churn_watch"]);
    expect(doc.filters.map((f) => f.name)).toEqual(["Date", "Region"]);
    expect(doc.elements[1].listen).toEqual({ Date: "orders.created_date" });
    expect(doc.elements[1].sorts).toEqual(["orders.count desc"]);
  });

  it("keeps top-level keys in their original order", () => {
    const doc = parseDashboard("- dashboard: d\n  title: T\n  layout: newspaper\n  elements: []");
    expect(Object.keys(doc.raw)).toEqual(["dashboard", "title", "layout", "elements"]);
  });

  it("accepts a bare mapping", () => {
    expect(parseDashboard("dashboard: d\ntitle: T").name).toBe("d");
  });

  it("returns an empty document for empty input", () => {
    expect(parseDashboard("")).toEqual({ elements: [], filters: [], raw: {} });
    expect(parseDashboard("---\n")).toEqual({ elements: [], filters: [], raw: {} });
  });

  it("keeps date-like values as strings", () => {
    const doc = parseDashboard("- dashboard: d\n  title: 2024-01-01");
    expect(doc.title).toBe("2024-01-01");
  });

  it("throws ParseError on invalid YAML", () => {
    expect(() => parseDashboard("- dashboard: [unclosed")).toThrow(ParseError);
  });

  it("throws ParseError when the top level is not a mapping", () => {
    expect(() => parseDashboard("just text")).toThrow(ParseError);
  });

  it("throws ParseError when elements is not a list of mappings", () => {
    expect(() => parseDashboard("dashboard: d\nelements: 5")).toThrow(/must be a list/);
    expect(() => parseDashboard("dashboard: d\nelements:\n- a")).toThrow(/item 0 must be a mapping/);
  });
});

describe("normalizeRecord", () => {
  const record = {
    name: "viz1",
    id: 12,
    slug: "abc",
    preferred_slug: "def",
    model: "thelook",
    title: "Revenue",
    hidden: false,
    show_view_names: true,
    comparison_type: "change",
    defaults_version: 1,
    row: null,
    col: 0,
  };

  it("drops volatile keys and matching noisy defaults", () => {
    expect(normalizeRecord(record, false)).toEqual({
      name: "viz1",
      model: "thelook",
      title: "Revenue",
      show_view_names: true,
      comparison_type: "change",
      col: 0,
    });
  });

  it("drops the model only when asked", () => {
    expect(normalizeRecord(record, true)).not.toHaveProperty("model");
    expect(normalizeRecord(record, false)).toHaveProperty("model", "thelook");
  });

  it("is idempotent", () => {
    const once = normalizeRecord(record, true);
    expect(normalizeRecord(once, true)).toEqual(once);
  });

  it("does not modify its input", () => {
    const input = { name: "a", id: 1, hidden: false };
    normalizeRecord(input, true);
    expect(input).toEqual({ name: "a", id: 1, hidden: false });
  });

  it("uses a custom noisy-default table", () => {
    const table = { ...NOISY_DEFAULTS, show_legend: true };
    expect(normalizeRecord({ name: "a", show_legend: true }, true, table)).toEqual({ name: "a" });
    expect(normalizeRecord({ name: "a", show_legend: true }, true)).toEqual({ name: "a", show_legend: true });
  });
});
