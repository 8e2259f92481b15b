/**
 * Tests for plan decomposition
 */

import { describe, it, expect } from "vitest";
import {
  decompose,
  extractAlternatives,
  extractComplexity,
  extractItems,
  extractQuestions,
} from "./decomposition.js";
import { parseResponseSections } from "./sections.js";
import { modelResponse, plan } from "../../test/mocks/fixtures.js";

describe("extractItems", () => {
  it("should build items with split files and parsed dependencies", () => {
    const items = extractItems(
      plan(
        { n: 1, title: "Create refund table", layer: "DB", files: "db/001_refunds.sql, src/refund.ts" },
        { n: 2, title: "Expose refund endpoint", layer: "xyz", dependsOn: "Step 1" },
      ),
    );

    expect(items).toEqual([
      {
        layer: "DB",
        title: "Create refund table",
        description: "",
        acceptance: "Unit test for step 1 passes",
        files: ["db/001_refunds.sql", "src/refund.ts"],
        order: 1,
        dependsOn: [],
        confidence: 0,
        confidenceFlags: [],
      },
      {
        layer: "GEN",
        title: "Expose refund endpoint",
        description: "",
        acceptance: "Unit test for step 2 passes",
        files: ["src/step2.ts"],
        order: 2,
        dependsOn: [1],
        confidence: 0,
        confidenceFlags: [],
      },
    ]);
  });

  it("should default a missing layer to GEN", () => {
    const [item] = extractItems(plan({ n: 1, title: "Tidy up", layer: null }));

    expect(item?.layer).toBe("GEN");
  });

  it("should read bulleted file lists and strip code ticks", () => {
    const text = [
      "- [ ] **Step 1:** Build the cart view",
      "  - **Layer:** FE",
      "  - **Files:**",
      "    - `src/ui/Cart.tsx`",
      "    - src/ui/Cart.css",
      "  - **Acceptance:** Cart renders 3 items",
    ].join("\n");

    expect(extractItems(text)[0]?.files).toEqual(["src/ui/Cart.tsx", "src/ui/Cart.css"]);
  });

  it("should treat placeholder files as none", () => {
    expect(extractItems(plan({ n: 1, title: "Decide", files: "None" }))[0]?.files).toEqual([]);
  });

  it("should sort items by step number", () => {
    const items = extractItems(plan({ n: 2, title: "Second" }, { n: 1, title: "First" }));

    expect(items.map((i) => i.order)).toEqual([1, 2]);
  });
});

describe("extractQuestions", () => {
  it("should collect missing-data markers and bulleted questions", () => {
    const concerns = [
      "- Which payment provider is used?",
      "- [DATA MISSING: refund window]",
      "Is this a question without a bullet?",
    ].join("\n");

    expect(extractQuestions(concerns)).toEqual([
      { question: "What is refund window?", context: "Data marked as missing: refund window" },
      { question: "Which payment provider is used?", context: "From concerns section" },
    ]);
  });

  it("should return nothing for empty concerns", () => {
    expect(extractQuestions("")).toEqual([]);
  });
});

describe("extractComplexity", () => {
  it.each([
    ["Estimated complexity: `L`", "L"],
    ["Complexity: **XL**", "XL"],
    ["A medium sized change (S)", "S"],
    ["complexity: maybe", "M"],
    ["", "M"],
  ])("should read %j as %s", (analysis, expected) => {
    expect(extractComplexity(analysis)).toBe(expected);
  });
});

describe("extractAlternatives", () => {
  it("should take the paragraph after an alternatives label", () => {
    expect(
      extractAlternatives("Use a queue.\n\nAlternatives: polling was discarded.\n\nMore text."),
    ).toBe("polling was discarded.");
  });

  it("should return empty text when none are mentioned", () => {
    expect(extractAlternatives("Use a queue.")).toBe("");
  });
});

describe("decompose", () => {
  it("should combine items, questions and complexity", () => {
    const sections = parseResponseSections(modelResponse(plan({ n: 1, title: "Add endpoint" })));

    const result = decompose(sections);

    expect(result.items).toHaveLength(1);
    expect(result.questions).toEqual([
      { question: "Which payment provider is used?", context: "From concerns section" },
    ]);
    expect(result.complexity).toBe("M");
    expect(result.alternatives).toBe("");
  });
});
