/**
 * Tests for the discovery filter
 */

import { describe, it, expect } from "vitest";
import {
  discoverDocuments,
  formatSelectionLog,
  parseSelection,
  stripCodeFence,
  type DiscoveryInput,
  type DiscoveryOptions,
} from "./discovery.js";
import type { KeywordExtractor } from "./keywords.js";
import { RerankConfigSchema } from "../config/schema.js";
import { GenerationMetrics } from "../generation/metrics.js";
import { TransportError } from "../mcp/errors.js";
import { FakeTransport } from "../../test/mocks/transport.js";
import { FakeModelClient } from "../../test/mocks/model.js";
import { pageReply, searchReply } from "../../test/mocks/fixtures.js";
import { silentLogger } from "../../test/mocks/logger.js";

const input: DiscoveryInput = {
  summary: "Add refund support to PaymentService",
  description: "",
  containerId: "500",
  maturity: "EXISTING",
  excludeIds: new Set(["601"]),
};

const candidates = [
  { id: "501", title: "Payment API" },
  { id: "502", title: "Team Meeting Notes" },
  { id: "503", title: "Refund Error Codes" },
];

function options(model: FakeModelClient, extra: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
  return {
    model,
    defaultModel: "deepseek-chat",
    rerank: RerankConfigSchema.parse({}),
    searchLimit: 20,
    maxKeywords: 5,
    logger: silentLogger(),
    ...extra,
  };
}

function storeWithCandidates(): FakeTransport {
  return new FakeTransport()
    .onSearch("ancestor = 500", searchReply(candidates))
    .onPage("501", pageReply("Payment API", "POST /refunds"))
    .onPage("502", pageReply("Team Meeting Notes", "Agenda"))
    .onPage("503", pageReply("Refund Error Codes", "E42 refund window closed"));
}

describe("stripCodeFence", () => {
  it("should unwrap json and bare fences", () => {
    expect(stripCodeFence('```json\n{"selected_ids": []}\n```')).toBe('{"selected_ids": []}');
    expect(stripCodeFence('```\n{"selected_ids": []}\n```')).toBe('{"selected_ids": []}');
    expect(stripCodeFence('Here you go:\n```json\n{}\n```\nThanks')).toBe("{}");
  });

  it("should leave unfenced text alone", () => {
    expect(stripCodeFence(' {"selected_ids": []} ')).toBe('{"selected_ids": []}');
  });
});

describe("parseSelection", () => {
  it("should read selected ids and normalize numbers to strings", () => {
    expect(parseSelection('{"selected_ids": [501, "502", "501"]}')).toEqual({ ids: ["501", "502"] });
  });

  it("should recover the same ids from fenced and unfenced replies", () => {
    const plain = '{"selected_ids": ["501", "503"]}';
    expect(parseSelection("```json\n" + plain + "\n```")).toEqual(parseSelection(plain));
  });

  it("should report a reply without selected_ids", () => {
    expect(parseSelection('{"ids": []}')).toEqual({ error: "Reply has no selected_ids array" });
  });

  it("should report invalid JSON", () => {
    const result = parseSelection("I pick 501");
    expect("error" in result && result.error.startsWith("Invalid JSON: ")).toBe(true);
  });
});

describe("discoverDocuments", () => {
  it("should keep exactly the reranked selection", async () => {
    const transport = storeWithCandidates();
    const model = new FakeModelClient(['{"selected_ids": ["501"]}']);

    const result = await discoverDocuments(transport, input, options(model));

    expect(result.documents).toEqual([
      {
        id: "501",
        title: "Payment API",
        url: "https://wiki.example.com/spaces/DEMO/pages/501/Payment+API",
        content: "POST /refunds",
      },
    ]);
    expect(result.errors).toEqual([]);
    expect(result.selectionLog?.selectedIds).toEqual(["501"]);
    expect(result.selectionLog?.candidates.map((c) => c.id)).toEqual(["501", "502", "503"]);
    expect(transport.queries).toEqual(['ancestor = 500 AND (text ~ "PaymentService")']);
    expect(transport.callsTo("confluence_search_pages")[0]?.["limit"]).toBe(20);
  });

  it("should send the rerank prompt with the configured call settings", async () => {
    const model = new FakeModelClient(['{"selected_ids": []}']);

    await discoverDocuments(storeWithCandidates(), input, options(model));

    const request = model.requests[0];
    expect(request?.temperature).toBe(0.1);
    expect(request?.maxTokens).toBe(256);
    expect(request?.model).toBe("deepseek-chat");
    expect(request?.system).toContain('{"selected_ids": []}');
    expect(request?.user).toContain(
      "- ID: `501` | Title: Payment API\n  Excerpt: Document titled: Payment API",
    );
    expect(request?.user).toContain("## Candidates (3 pages)");
  });

  it("should accept a fenced rerank reply", async () => {
    const model = new FakeModelClient(['```json\n{"selected_ids": ["501"]}\n```']);

    const result = await discoverDocuments(storeWithCandidates(), input, options(model));

    expect(result.documents.map((d) => d.id)).toEqual(["501"]);
  });

  it("should ignore ids that were never offered", async () => {
    const transport = storeWithCandidates();
    const model = new FakeModelClient(['{"selected_ids": ["999", "503"]}']);

    const result = await discoverDocuments(transport, input, options(model));

    expect(result.documents.map((d) => d.id)).toEqual(["503"]);
    expect(result.selectionLog?.ignoredIds).toEqual(["999"]);
    expect(transport.callsTo("confluence_get_page")).toEqual([{ page_id: "503" }]);
  });

  it("should exclude mandatory documents from the candidates", async () => {
    const transport = new FakeTransport().onSearch(
      "ancestor = 500",
      searchReply([{ id: "601", title: "Project Passport" }, { id: "501", title: "Payment API" }]),
    );
    const model = new FakeModelClient(['{"selected_ids": ["601"]}']);

    const result = await discoverDocuments(transport, input, options(model));

    expect(result.selectionLog?.candidates.map((c) => c.id)).toEqual(["501"]);
    expect(result.selectionLog?.ignoredIds).toEqual(["601"]);
    expect(result.documents).toEqual([]);
  });

  it("should degrade to no documents when the reply is not JSON", async () => {
    const model = new FakeModelClient(["I pick 501"]);

    const result = await discoverDocuments(storeWithCandidates(), input, options(model));

    expect(result.documents).toEqual([]);
    expect(result.selectionLog?.rawResponse).toBe("I pick 501");
    expect(result.selectionLog?.error?.startsWith("Invalid JSON: ")).toBe(true);
    expect(result.errors[0]?.startsWith("Document rerank failed: Invalid JSON: ")).toBe(true);
  });

  it("should keep the selection log and record the attempt when the model call fails", async () => {
    const metrics = new GenerationMetrics("PROJ-9");
    const model = new FakeModelClient([new Error("rate limited")]);

    const result = await discoverDocuments(storeWithCandidates(), input, options(model, { metrics }));

    expect(result.documents).toEqual([]);
    expect(result.selectionLog?.error).toBe("Model call failed: rate limited");
    expect(result.errors).toEqual(["Document rerank failed: Model call failed: rate limited"]);
    expect(metrics.attempts).toHaveLength(1);
    expect(metrics.attempts[0]?.purpose).toBe("rerank");
    expect(metrics.attempts[0]?.error).toBe("rate limited");
  });

  it("should record a successful rerank in the metrics", async () => {
    const metrics = new GenerationMetrics("PROJ-9");
    const model = new FakeModelClient([{ text: '{"selected_ids": []}', tokensIn: 300, tokensOut: 12 }]);

    await discoverDocuments(storeWithCandidates(), input, options(model, { metrics }));

    expect(metrics.attempts[0]).toMatchObject({
      attempt: 1,
      purpose: "rerank",
      model: "deepseek-chat",
      tokensIn: 300,
      tokensOut: 12,
      validation: null,
    });
  });

  it("should skip failed page fetches and keep the rest", async () => {
    const transport = new FakeTransport()
      .onSearch("ancestor = 500", searchReply(candidates))
      .onPage("501", pageReply("Payment API", "POST /refunds"))
      .onPage("503", new TransportError("Request timed out"));
    const model = new FakeModelClient(['{"selected_ids": ["501", "503"]}']);

    const result = await discoverDocuments(transport, input, options(model));

    expect(result.documents.map((d) => d.id)).toEqual(["501"]);
    expect(result.errors).toEqual(["Failed to fetch page 503: Request timed out"]);
  });

  it("should report a failed search without raising", async () => {
    const transport = new FakeTransport().on(
      "confluence_search_pages",
      new TransportError("HTTP error 502: bad gateway"),
    );
    const model = new FakeModelClient();

    const result = await discoverDocuments(transport, input, options(model));

    expect(result).toEqual({
      documents: [],
      selectionLog: null,
      errors: ["Discovery search failed: HTTP error 502: bad gateway"],
    });
    expect(model.requests).toHaveLength(0);
  });

  it("should not call the model when no candidates remain", async () => {
    const transport = new FakeTransport().onSearch("ancestor = 500", searchReply([]));
    const model = new FakeModelClient();

    const result = await discoverDocuments(transport, input, options(model));

    expect(result.selectionLog).toBeNull();
    expect(model.requests).toHaveLength(0);
  });

  it.each(["NEW_PROJECT", "BRAND_NEW"] as const)("should skip discovery for %s", async (maturity) => {
    const transport = new FakeTransport();

    const result = await discoverDocuments(
      transport,
      { ...input, maturity },
      options(new FakeModelClient()),
    );

    expect(result).toEqual({ documents: [], selectionLog: null, errors: [] });
    expect(transport.calls).toHaveLength(0);
  });

  it("should use an injected keyword extractor", async () => {
    const extractor: KeywordExtractor = { extract: () => ["refund", "ledger"] };
    const transport = new FakeTransport().onSearch("ancestor = 500", searchReply([]));

    await discoverDocuments(
      transport,
      input,
      options(new FakeModelClient(), { keywordExtractor: extractor }),
    );

    expect(transport.queries).toEqual(['ancestor = 500 AND (text ~ "refund OR ledger")']);
  });
});

describe("formatSelectionLog", () => {
  it("should mark selected and rejected candidates", async () => {
    const model = new FakeModelClient(['{"selected_ids": ["501", "777"]}']);
    const result = await discoverDocuments(storeWithCandidates(), input, options(model));
    if (!result.selectionLog) throw new Error("expected a selection log");

    const markdown = formatSelectionLog(result.selectionLog);

    expect(markdown).toContain("- [SELECTED] `501` - Payment API");
    expect(markdown).toContain("- [rejected] `502` - Team Meeting Notes");
    expect(markdown).toContain("Ignored ids (not offered): 777");
    expect(markdown).toContain("| 503 | Refund Error Codes | Document titled: Refund Error Codes |");
    expect(markdown).toContain("- Tokens In: 100");
  });
});
