import { describe, expect, it } from "vitest";
import type { RagAnswer, SearchHit } from "../src/services/backend.js";
import {
  formatAttributes,
  formatConversation,
  formatConversationItem,
  formatFiles,
  formatHit,
  formatStores,
  formatTimestamp,
  renderTable,
} from "../src/utils/format.js";
import {
  formatSourceCitations,
  groupSourcesByFile,
} from "../src/utils/sources.js";

function hit(overrides: Partial<SearchHit>): SearchHit {
  return {
    fileId: "file-1",
    fileName: "a.md",
    score: 0.5,
    attributes: {},
    text: "",
    ...overrides,
  };
}

describe("format", () => {
  it("formats unix seconds as UTC", () => {
    expect(formatTimestamp(1_700_000_000)).toBe("2023-11-14 22:13:20");
  });

  it("formats attributes, skipping keys", () => {
    expect(formatAttributes({ file_name: "a.md", dept: "hr", year: "2024" }, ["file_name"])).toBe(
      "dept=hr, year=2024"
    );
  });

  it("renders an aligned table", () => {
    expect(
      renderTable(["ID", "NAME"], [
        ["vs_1", "Alpha"],
        ["vs_22", "B"],
      ])
    ).toBe(["ID     NAME", "─────  ─────", "vs_1   Alpha", "vs_22  B"].join("\n"));
  });

  it("reports empty listings", () => {
    expect(formatStores([])).toBe("📭 No vector stores found.");
    expect(formatFiles([], "file_name")).toBe("📭 No files in this vector store.");
  });

  it("lists stores with file counts", () => {
    const table = formatStores([
      {
        id: "vs_1",
        name: "Docs",
        status: "completed",
        createdAt: 1_700_000_000,
        usageBytes: 10,
        fileCounts: { inProgress: 1, completed: 2, failed: 0, cancelled: 0, total: 3 },
      },
    ]);

    expect(table.split("\n")[2]).toBe(
      "vs_1  Docs  2/3    completed  2023-11-14 22:13:20"
    );
  });

  it("formats a search hit with attributes and a preview", () => {
    expect(
      formatHit(
        hit({
          attributes: { file_name: "a.md", dept: "hr" },
          text: "line one\n\nline   two",
        }),
        0,
        "file_name"
      )
    ).toBe("1. a.md (score: 0.5000)\n   🏷️  dept=hr\n   line one line two");
  });

  it("truncates long previews", () => {
    const formatted = formatHit(hit({ text: "a".repeat(250) }), 1, "file_name");

    expect(formatted).toBe(`2. a.md (score: 0.5000)\n   ${"a".repeat(200)}...`);
  });

  it("formats conversations and their items", () => {
    expect(
      formatConversation({ id: "conv_1", createdAt: 1_700_000_000, metadata: {} })
    ).toBe(
      "ID:       conv_1\nCreated:  2023-11-14 22:13:20\nMetadata: (none)"
    );
    expect(
      formatConversationItem({ id: "msg_1", type: "message", role: "user", text: "Hi\nthere" })
    ).toBe("[message/user] msg_1: Hi there");
    expect(formatConversationItem({ type: "file_search_call", text: "" })).toBe(
      "[file_search_call]"
    );
  });
});

describe("sources", () => {
  const answer: RagAnswer = {
    responseId: "resp_1",
    status: "completed",
    model: "test-model",
    text: "",
    citations: [
      { fileId: "file-2", fileName: "b.md", index: 0 },
      { fileId: "file-3", fileName: "c.md", index: 4 },
    ],
    results: [
      hit({ fileId: "file-1", fileName: "a.md", score: 0.9 }),
      hit({ fileId: "file-2", fileName: "b.md", score: 0.4 }),
      hit({ fileId: "file-2", fileName: "b.md", score: 0.6 }),
    ],
  };

  it("groups chunks by file with cited files first", () => {
    expect(groupSourcesByFile(answer)).toEqual([
      { fileId: "file-2", fileName: "b.md", bestScore: 0.6, chunks: 2, cited: true },
      { fileId: "file-3", fileName: "c.md", bestScore: 0, chunks: 0, cited: true },
      { fileId: "file-1", fileName: "a.md", bestScore: 0.9, chunks: 1, cited: false },
    ]);
  });

  it("formats grouped sources", () => {
    expect(formatSourceCitations(groupSourcesByFile(answer))).toBe(
      [
        "  [1] b.md (score: 0.60, 2 chunks, cited)",
        "  [2] c.md (cited)",
        "  [3] a.md (score: 0.90, 1 chunk)",
      ].join("\n")
    );
  });
});
