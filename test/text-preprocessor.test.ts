import { describe, it, expect } from "vitest";
import {
  stripVolatileFields,
  substituteModelReference,
  extractDashboardName,
  MODEL_PLACEHOLDER,
} from "../src/text-preprocessor.js";
import { ParseError } from "../src/types.js";

describe("stripVolatileFields", () => {
  it("removes dashboard-level id and slug lines but keeps deeper ones", () => {
    const input = [
      "- dashboard: sales",
      "  id: 42",
      "  slug: abc",
      "  title: Sales",
      "  elements:",
      "  - name: viz1",
      "    query:",
      "      id: 7",
    ].join("\n");

    expect(stripVolatileFields(input)).toBe(
      ["- dashboard: sales", "  title: Sales", "  elements:", "  - name: viz1", "    query:", "      id: 7"].join("\n"),
    );
  });

  it("removes preferred_slug and element keys at four spaces", () => {
    const input = "- dashboard: d\n  preferred_slug: Xy12\n  elements:\n  - name: a\n    id: 9\n    title: A";
    expect(stripVolatileFields(input)).toBe("- dashboard: d\n  elements:\n  - name: a\n    title: A");
  });

  it("does not touch keys that merely start with id", () => {
    const input = "- dashboard: d\n  identity: x\n  slugline: y";
    expect(stripVolatileFields(input)).toBe(input);
  });
});

describe("substituteModelReference", () => {
  const forms = ['model: "base_model"', "model: 'base_model'", "model: base_model", "model: @{model_name}"];

  it.each(forms)("rewrites %s to a quoted tenant model", (line) => {
    expect(substituteModelReference(`    ${line}`, "tenant_1")).toBe('    model: "tenant_1"');
  });

  it.each(forms)("rewrites %s to the bare placeholder", (line) => {
    expect(substituteModelReference(`    ${line}`, MODEL_PLACEHOLDER)).toBe("    model: @{model_name}");
  });

  it("defaults to the model_name placeholder", () => {
    expect(substituteModelReference("  model: thelook")).toBe("  model: @{model_name}");
  });

  it("handles model as the first key of a sequence item", () => {
    expect(substituteModelReference("  - model: thelook\n    explore: orders", "t1")).toBe(
      '  - model: "t1"\n    explore: orders',
    );
  });

  it("leaves keys that end in model alone", () => {
    const input = "  explore_model: thelook";
    expect(substituteModelReference(input, "t1")).toBe(input);
  });

  it("quotes the placeholder on request", () => {
    expect(substituteModelReference("  model: thelook", MODEL_PLACEHOLDER, true)).toBe('  model: "@{model_name}"');
    expect(substituteModelReference('  model: "@{model_name}"', MODEL_PLACEHOLDER, true)).toBe(
      '  model: "@{model_name}"',
    );
  });

  it("leaves model lines inside block scalars alone", () => {
    const input = [
      "  - name: notes",
      "    body_text: |-",
      "      Source",
      "      model: finance",
      "",
      "      model: still text",
      "    model: thelook",
      "  - |",
      "    model: in a list item",
      "  - model: other",
    ].join("\n");

    expect(substituteModelReference(input, "t1")).toBe(
      [
        "  - name: notes",
        "    body_text: |-",
        "      Source",
        "      model: finance",
        "",
        "      model: still text",
        '    model: "t1"',
        "  - |",
        "    model: in a list item",
        '  - model: "t1"',
      ].join("\n"),
    );
  });

  it("measures the block from the key after a sequence dash", () => {
    const input = "  - note: >-\n      model: folded\n    model: thelook";
    expect(substituteModelReference(input, "t1")).toBe('  - note: >-\n      model: folded\n    model: "t1"');
  });

  it("is idempotent", () => {
    const once = substituteModelReference("  model: thelook\n  model: 'x'", "t1");
    expect(substituteModelReference(once, "t1")).toBe(once);
  });
});

describe("extractDashboardName", () => {
  it("reads the dashboard declaration", () => {
    expect(extractDashboardName("---\n- dashboard: sales_overview\n  title: Sales")).toBe("sales_overview");
  });

  it("throws ParseError when there is no declaration", () => {
    expect(() => extractDashboardName("title: Sales")).toThrow(ParseError);
  });
});
