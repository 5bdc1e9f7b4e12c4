import OpenAI from "openai";
import { describe, expect, it } from "vitest";
import { NotFoundError, RemoteAPIError } from "../src/errors.js";
import { OpenAIBackend } from "../src/services/openai/index.js";

interface RecordedRequest {
  method: string;
  path: string;
  search: string;
  body: unknown;
}

interface StubReply {
  status?: number;
  body: unknown;
}

type Route = (request: RecordedRequest) => StubReply;

/**
 * OpenAIBackend on a real SDK client whose fetch answers in process
 */
function stubBackend(route: Route) {
  const requests: RecordedRequest[] = [];

  const fetch = async (
    input: string | URL | Request,
    init?: RequestInit
  ): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const request: RecordedRequest = {
      method: (init?.method ?? "GET").toUpperCase(),
      path: url.pathname,
      search: url.search,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);

    const reply = route(request);
    return new Response(JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { "content-type": "application/json" },
    });
  };

  const client = new OpenAI({
    apiKey: "test-secret",
    baseURL: "http://api.test/v1",
    maxRetries: 0,
    fetch,
  });
  return { backend: new OpenAIBackend(client), requests };
}

function notFound(): StubReply {
  return {
    status: 404,
    body: { error: { message: "not found", type: "invalid_request_error" } },
  };
}

function remoteStore(id: string) {
  return {
    id,
    object: "vector_store",
    name: `store ${id}`,
    status: "completed",
    created_at: 1_700_000_000,
    usage_bytes: 0,
    last_active_at: null,
    metadata: null,
    file_counts: { in_progress: 0, completed: 1, failed: 0, cancelled: 0, total: 1 },
  };
}

const remoteStoreFile = {
  id: "file-1",
  object: "vector_store.file",
  vector_store_id: "vs_1",
  status: "completed",
  created_at: 1_700_000_000,
  usage_bytes: 120,
  last_error: null,
  attributes: { file_name: "handbook.pdf", year: 2024 },
};

describe("OpenAIBackend", () => {
  it("walks every page of vector stores", async () => {
    const { backend, requests } = stubBackend((request) =>
      request.search.includes("after=vs_1")
        ? { body: { object: "list", data: [remoteStore("vs_2")], has_more: false } }
        : { body: { object: "list", data: [remoteStore("vs_1")], has_more: true } }
    );

    const stores = await backend.listVectorStores();

    expect(stores.map((store) => store.id)).toEqual(["vs_1", "vs_2"]);
    expect(requests.map((r) => r.path)).toEqual([
      "/v1/vector_stores",
      "/v1/vector_stores",
    ]);
    expect(requests[0].search).toContain("limit=100");
  });

  it("attaches a file with a static chunking strategy", async () => {
    const { backend, requests } = stubBackend(() => ({ body: remoteStoreFile }));

    const attached = await backend.attachFile("vs_1", {
      fileId: "file-1",
      attributes: { file_name: "handbook.pdf" },
      chunking: { maxChunkSize: 300, chunkOverlap: 100 },
    });

    expect(requests[0]).toMatchObject({ method: "POST", path: "/v1/vector_stores/vs_1/files" });
    expect(requests[0].body).toEqual({
      file_id: "file-1",
      attributes: { file_name: "handbook.pdf" },
      chunking_strategy: {
        type: "static",
        static: { max_chunk_size_tokens: 300, chunk_overlap_tokens: 100 },
      },
    });
    expect(attached).toMatchObject({
      id: "file-1",
      storeId: "vs_1",
      status: "completed",
      attributes: { file_name: "handbook.pdf", year: "2024" },
    });
  });

  it("searches with ranking options and maps the hits", async () => {
    const { backend, requests } = stubBackend(() => ({
      body: {
        object: "vector_store.search_results.page",
        search_query: "leave policy",
        data: [
          {
            file_id: "file-1",
            filename: "handbook.pdf",
            score: 0.82,
            attributes: { dept: "hr" },
            content: [{ type: "text", text: "25 days" }],
          },
        ],
        has_more: false,
        next_page: null,
      },
    }));

    const hits = await backend.searchVectorStore("vs_1", {
      query: "leave policy",
      maxResults: 5,
      rewriteQuery: true,
      scoreThreshold: 0.4,
    });

    expect(requests[0]).toMatchObject({ method: "POST", path: "/v1/vector_stores/vs_1/search" });
    expect(requests[0].body).toEqual({
      query: "leave policy",
      max_num_results: 5,
      rewrite_query: true,
      ranking_options: { score_threshold: 0.4 },
    });
    expect(hits).toEqual([
      {
        fileId: "file-1",
        fileName: "handbook.pdf",
        score: 0.82,
        attributes: { dept: "hr" },
        text: "25 days",
      },
    ]);
  });

  it("binds the conversation and the file_search tool on a RAG response", async () => {
    const { backend, requests } = stubBackend(() => ({
      body: {
        id: "resp_1",
        object: "response",
        status: "completed",
        model: "test-model",
        conversation: { id: "conv_1" },
        output_text: "25 days.",
        output: [
          {
            type: "message",
            id: "msg_1",
            role: "assistant",
            status: "completed",
            content: [{ type: "output_text", text: "25 days.", annotations: [] }],
          },
        ],
      },
    }));

    const answer = await backend.createRagResponse({
      model: "test-model",
      input: "How many days?",
      conversationId: "conv_1",
      storeIds: ["vs_1"],
      maxResults: 4,
      scoreThreshold: 0.5,
    });

    expect(requests[0]).toMatchObject({ method: "POST", path: "/v1/responses" });
    expect(requests[0].body).toEqual({
      model: "test-model",
      input: "How many days?",
      conversation: "conv_1",
      include: ["file_search_call.results"],
      tools: [
        {
          type: "file_search",
          vector_store_ids: ["vs_1"],
          max_num_results: 4,
          ranking_options: { ranker: "auto", score_threshold: 0.5 },
        },
      ],
    });
    expect(answer).toMatchObject({
      responseId: "resp_1",
      conversationId: "conv_1",
      status: "completed",
      text: "25 days.",
    });
  });

  it("deletes an uploaded file", async () => {
    const { backend, requests } = stubBackend(() => ({
      body: { id: "file-1", object: "file", deleted: true },
    }));

    expect(await backend.deleteFile("file-1")).toBe(true);
    expect(requests[0]).toMatchObject({ method: "DELETE", path: "/v1/files/file-1" });
  });

  it("maps a 404 to NotFoundError for the addressed resource", async () => {
    const { backend } = stubBackend(notFound);

    await expect(backend.retrieveVectorStore("vs_missing")).rejects.toThrow(
      new NotFoundError("vector store", "vs_missing").message
    );
    await expect(backend.retrieveStoreFile("vs_1", "file-missing")).rejects.toThrow(
      new NotFoundError("file", "file-missing").message
    );
    await expect(backend.retrieveConversation("conv_missing")).rejects.toThrow(
      new NotFoundError("conversation", "conv_missing").message
    );
    await expect(backend.retrieveResponse("resp_missing")).rejects.toThrow(
      new NotFoundError("response", "resp_missing").message
    );
  });

  it("keeps a 404 on a RAG response as a remote error", async () => {
    const { backend } = stubBackend(notFound);

    const error = await backend
      .createRagResponse({
        model: "test-model",
        input: "q",
        conversationId: "conv_1",
        storeIds: ["vs_missing"],
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteAPIError);
    expect(error).toHaveProperty("status", 404);
  });
});
