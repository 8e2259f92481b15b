/**
 * Tests for confidence scoring
 */

import { describe, it, expect } from "vitest";
import { scoreItem, scoreItems, summarizeConfidence } from "./confidence.js";
import type { DecomposedItem } from "./decomposition.js";
import { buildContext } from "../context/aggregator.js";
import type { AggregatedContext } from "../context/types.js";
import type { RepositoryContext } from "../repository/types.js";
import { knowledgeContext, ticketContext } from "../../test/mocks/fixtures.js";

function item(overrides: Partial<DecomposedItem> = {}): DecomposedItem {
  return {
    layer: "BE",
    title: "Add refund endpoint to payment service API",
    description: "",
    acceptance: "POST /refunds returns 201",
    files: ["src/refund.ts"],
    order: 1,
    dependsOn: [],
    confidence: 0,
    confidenceFlags: [],
    ...overrides,
  };
}

function repository(tree: string, files: string[] = []): RepositoryContext {
  return {
    status: "EXISTS",
    path: "/work/shop",
    branch: "main",
    tree,
    files,
    fileCount: 2,
    keyDirectories: ["src/"],
    recentCommits: [],
    errors: [],
  };
}

function context(repo: RepositoryContext | null, withDocs = true): AggregatedContext {
  return buildContext({
    ticket: ticketContext(),
    knowledge: knowledgeContext(
      withDocs
        ? {
            maturity: "EXISTING",
            missing: [],
            mandatory: [{ id: "601", title: "Project Passport", url: "u", content: "c" }],
          }
        : {},
    ),
    repository: repo,
    generatedAt: "2024-05-01T12:00:00.000Z",
  });
}

describe("scoreItem", () => {
  it("should give full marks when every signal is present", () => {
    expect(scoreItem(item(), context(repository("src/\n  refund.ts")))).toEqual({
      score: 1,
      flags: [],
    });
  });

  it("should give partial repository credit without repository signals", () => {
    expect(scoreItem(item(), null)).toEqual({
      score: 0.75,
      flags: ["No repository context available (partial credit)", "No documentation available"],
    });
  });

  it("should flag every missing signal on an empty item", () => {
    const bare = item({ layer: "GEN", title: "Fix", acceptance: "", files: [] });

    expect(scoreItem(bare, null)).toEqual({
      score: 0.1,
      flags: [
        "No files specified",
        "No acceptance criteria",
        "Generic layer (GEN)",
        "No repository context available (partial credit)",
        "No documentation available",
        "Title is too generic",
      ],
    });
  });

  it("should not credit vague acceptance", () => {
    const result = scoreItem(item({ acceptance: "works as expected" }), null);

    expect(result.score).toBe(0.55);
    expect(result.flags).toContain("Vague acceptance criteria");
  });

  it("should flag files missing from the repository tree", () => {
    const result = scoreItem(item(), context(repository("src/\n  index.ts")));

    expect(result.score).toBe(0.8);
    expect(result.flags).toEqual(["Files not found in repository tree"]);
  });

  it("should flag unverifiable files when the item lists none", () => {
    const result = scoreItem(item({ files: [] }), context(repository("src/\n  index.ts")));

    expect(result.flags).toEqual(["No files specified", "Cannot verify files against repository"]);
  });

  it("should find files past the end of a capped tree", () => {
    const tree = "README.md\n... (400 more files)";
    const files = ["README.md", "src/billing/refund.ts"];

    const result = scoreItem(
      item({ files: ["src/billing/refund.ts"] }),
      context(repository(tree, files)),
    );

    expect(result).toEqual({ score: 1, flags: [] });
  });

  it("should not match a file the repository does not track", () => {
    const result = scoreItem(
      item({ files: ["src/billing/chargeback.ts"] }),
      context(repository("README.md", ["README.md", "src/billing/refund.ts"])),
    );

    expect(result.score).toBe(0.8);
    expect(result.flags).toEqual(["Files not found in repository tree"]);
  });

  it("should count Cyrillic title words", () => {
    const result = scoreItem(
      item({ title: "Создать страницу паспорта проекта для платёжного сервиса" }),
      context(repository("src/\n  refund.ts")),
    );

    expect(result).toEqual({ score: 1, flags: [] });
  });

  it("should give partial credit for a four-word title", () => {
    const result = scoreItem(item({ title: "Add refund endpoint migration" }), null);

    expect(result.score).toBe(0.68);
    expect(result.flags).toContain("Title could be more specific");
  });

  it("should never decrease when acceptance is added", () => {
    const variants = [
      item({ acceptance: "" }),
      item({ acceptance: "", files: [], layer: "GEN" }),
      item({ acceptance: "", title: "Fix" }),
    ];
    const contexts = [null, context(null, false), context(repository("src/\n  refund.ts"))];

    for (const base of variants) {
      for (const ctx of contexts) {
        const before = scoreItem(base, ctx).score;
        const after = scoreItem({ ...base, acceptance: "Refund row has status PENDING" }, ctx).score;
        expect(after).toBeGreaterThanOrEqual(before);
      }
    }
  });
});

describe("scoreItems", () => {
  it("should fill scores without mutating the input", () => {
    const items = [item()];

    const scored = scoreItems(items, null);

    expect(scored[0]?.confidence).toBe(0.75);
    expect(scored[0]?.confidenceFlags).toHaveLength(2);
    expect(items[0]?.confidence).toBe(0);
  });
});

describe("summarizeConfidence", () => {
  it("should average scores and flag items below the threshold", () => {
    const items = [
      item({ order: 1, confidence: 1 }),
      item({ order: 2, confidence: 0.5 }),
      item({ order: 3, confidence: 0.75 }),
    ];

    expect(summarizeConfidence(items, 0.7)).toEqual({ overall: 0.75, flagged: [2], threshold: 0.7 });
  });

  it("should report zero for no items", () => {
    expect(summarizeConfidence([])).toEqual({ overall: 0, flagged: [], threshold: 0.7 });
  });
});
