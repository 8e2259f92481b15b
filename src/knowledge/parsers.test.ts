/**
 * Tests for upstream reply parsers
 */

import { describe, it, expect } from "vitest";
import {
  deriveSpace,
  extractContainerId,
  extractSpaceKey,
  parseComments,
  parsePageContent,
  parseSearchResults,
  parseTicketKey,
  parseTicketMarkdown,
} from "./parsers.js";
import { ValidationError } from "../utils/errors.js";
import { commentsReply, pageReply, searchReply, ticketReply } from "../../test/mocks/fixtures.js";

describe("parseTicketKey", () => {
  it("should accept a bare key case-insensitively", () => {
    expect(parseTicketKey("proj-12")).toBe("PROJ-12");
    expect(parseTicketKey(" WEB3-6 ")).toBe("WEB3-6");
  });

  it("should extract a key from a URL", () => {
    expect(parseTicketKey("https://tracker.example.com/browse/proj-12")).toBe("PROJ-12");
  });

  it("should reject input without a key", () => {
    expect(() => parseTicketKey("not a key")).toThrow(ValidationError);
    expect(() => parseTicketKey("not a key")).toThrow("Could not parse a ticket key from: not a key");
  });
});

describe("parseTicketMarkdown", () => {
  it("should parse every field of a ticket reply", () => {
    const ticket = parseTicketMarkdown(
      "PROJ-7",
      ticketReply({
        key: "PROJ-7",
        summary: "Add refund endpoint",
        description: "Refunds go through the PaymentService.\n\nKeep the audit log.",
        type: "Task",
        status: "In Progress",
        projectName: "Payments",
        labels: ["web3", "backend"],
        projectFolder: "Checkout",
        projectLink: "https://wiki.example.com/spaces/PAY/folder/500",
      }),
    );

    expect(ticket).toEqual({
      key: "PROJ-7",
      summary: "Add refund endpoint",
      description: "Refunds go through the PaymentService.\n\nKeep the audit log.",
      type: "Task",
      status: "In Progress",
      projectKey: "PROJ",
      projectName: "Payments",
      assignee: null,
      labels: ["web3", "backend"],
      parent: null,
      subtasks: [],
      created: "2024-03-01T09:00:00.000+0000",
      updated: "2024-03-02T09:00:00.000+0000",
      comments: [],
      projectFolder: "Checkout",
      projectLink: "https://wiki.example.com/spaces/PAY/folder/500",
    });
  });

  it("should treat None and placeholders as absent", () => {
    const ticket = parseTicketMarkdown("PROJ-1", ticketReply({ key: "PROJ-1", summary: "Set up project" }));

    expect(ticket.description).toBe("");
    expect(ticket.labels).toEqual([]);
    expect(ticket.projectFolder).toBe("");
    expect(ticket.projectLink).toBe("");
  });

  it("should read assignee, parent and subtasks when present", () => {
    const text = [
      "# OPS-3: Rotate keys",
      "",
      "**Assignee:** Sam Rivera",
      "",
      "## Description",
      "",
      "Rotate them.",
      "",
      "## Metadata",
      "",
      "- Parent: OPS-1",
      "- Subtasks: OPS-4, OPS-5",
    ].join("\n");

    const ticket = parseTicketMarkdown("OPS-3", text);

    expect(ticket.assignee).toBe("Sam Rivera");
    expect(ticket.parent).toBe("OPS-1");
    expect(ticket.subtasks).toEqual(["OPS-4", "OPS-5"]);
    expect(ticket.projectKey).toBe("OPS");
    expect(ticket.description).toBe("Rotate them.");
  });
});

describe("parseComments", () => {
  it("should split comments by header", () => {
    const comments = parseComments(
      commentsReply("PROJ-1", [
        { author: "Dana Lee", body: "Use the v2 API" },
        { author: "Jean-Luc Roy", body: "Agreed" },
      ]),
    );

    expect(comments).toEqual([
      { author: "Dana Lee", created: "2024-03-01T10:00:00.000+0000", body: "Use the v2 API" },
      { author: "Jean-Luc Roy", created: "2024-03-02T10:00:00.000+0000", body: "Agreed" },
    ]);
  });

  it("should return nothing for an unrelated reply", () => {
    expect(parseComments("Error: boom")).toEqual([]);
  });
});

describe("parseSearchResults", () => {
  it("should parse titles, urls and ids", () => {
    const results = parseSearchResults(
      searchReply([
        { id: "500", title: "Checkout" },
        { id: "501", title: "Payment API", space: "PAY" },
      ]),
    );

    expect(results).toEqual([
      {
        id: "500",
        title: "Checkout",
        url: "https://wiki.example.com/spaces/DEMO/pages/500/Checkout",
        excerpt: "Document titled: Checkout",
      },
      {
        id: "501",
        title: "Payment API",
        url: "https://wiki.example.com/spaces/PAY/pages/501/Payment+API",
        excerpt: "Document titled: Payment API",
      },
    ]);
  });

  it("should use an excerpt line when present", () => {
    const reply = [
      "Found 1 pages:",
      "",
      "- **Refunds** (PAY) - [View](https://wiki.example.com/viewpage.action?pageId=42)",
      "  Excerpt: Refund flow and error codes",
    ].join("\n");

    expect(parseSearchResults(reply)).toEqual([
      {
        id: "42",
        title: "Refunds",
        url: "https://wiki.example.com/viewpage.action?pageId=42",
        excerpt: "Refund flow and error codes",
      },
    ]);
  });

  it("should fall back to the last url segment for the id", () => {
    const reply = "- **Notes** (X) - [View](https://wiki.example.com/x/abc123/)";
    expect(parseSearchResults(reply)[0]?.id).toBe("abc123");
  });

  it("should return nothing for an empty result", () => {
    expect(parseSearchResults("Found 0 pages:\n")).toEqual([]);
  });
});

describe("parsePageContent", () => {
  it("should keep only the content section with blank runs collapsed", () => {
    expect(parsePageContent(pageReply("T", "Line one   \n\n\n\nLine two"))).toBe(
      "Line one\n\nLine two",
    );
  });

  it("should use the whole reply when there is no content heading", () => {
    expect(parsePageContent("  plain text  \n")).toBe("plain text");
  });
});

describe("locator helpers", () => {
  it("should extract container ids from known URL shapes", () => {
    expect(extractContainerId("https://wiki.example.com/spaces/CHK/folder/500?src=x")).toBe("500");
    expect(extractContainerId("https://wiki.example.com/spaces/CHK/pages/612/Home")).toBe("612");
    expect(extractContainerId("https://wiki.example.com/pages/viewpage.action?pageId=777")).toBe(
      "777",
    );
    expect(extractContainerId("https://wiki.example.com/display/CHK")).toBeNull();
  });

  it("should extract space keys", () => {
    expect(extractSpaceKey("https://wiki.example.com/spaces/CHK/folder/500")).toBe("CHK");
    expect(extractSpaceKey("https://wiki.example.com/folder/500")).toBeNull();
  });
});

describe("deriveSpace", () => {
  const ticket = parseTicketMarkdown(
    "PROJ-2",
    ticketReply({ key: "PROJ-2", summary: "x", labels: ["backend-team", "web3"] }),
  );

  it("should prefer a configured default", () => {
    expect(deriveSpace(ticket, "OPS")).toBe("OPS");
  });

  it("should use the first single-word label", () => {
    expect(deriveSpace(ticket)).toBe("WEB3");
  });

  it("should fall back to the project key", () => {
    expect(deriveSpace({ ...ticket, labels: [] })).toBe("PROJ");
  });
});
