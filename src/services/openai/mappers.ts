/**
 * Conversions from OpenAI SDK payloads to backend types.
 *
 * The parameter types are the structural subset of the SDK objects we read,
 * so SDK responses pass straight in and tests can use plain literals.
 */

import type { Attributes } from "../../utils/attributes.js";
import type {
  Citation,
  ConversationInfo,
  ConversationItem,
  RagAnswer,
  SearchHit,
  StoreFileInfo,
  UploadedFile,
  VectorStoreInfo,
} from "../backend.js";

type RemoteAttributes = { [key: string]: string | number | boolean } | null;

export interface RemoteVectorStore {
  id: string;
  name: string;
  status: string;
  created_at: number;
  usage_bytes: number;
  file_counts: {
    in_progress: number;
    completed: number;
    failed: number;
    cancelled: number;
    total: number;
  };
}

export interface RemoteStoreFile {
  id: string;
  vector_store_id: string;
  status: string;
  created_at: number;
  usage_bytes: number;
  attributes?: RemoteAttributes;
  last_error: { code: string; message: string } | null;
}

export interface RemoteFile {
  id: string;
  filename: string;
  bytes: number;
}

export interface RemoteSearchResult {
  file_id: string;
  filename: string;
  score: number;
  attributes: RemoteAttributes;
  content: Array<{ text: string }>;
}

export interface RemoteConversation {
  id: string;
  created_at: number;
  metadata: unknown;
}

export interface RemoteResponse {
  id: string;
  status?: string;
  model: string;
  output_text: string;
  output: unknown[];
  conversation?: { id: string } | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(value: Record<string, unknown>, key: string): string | undefined {
  const field = value[key];
  return typeof field === "string" ? field : undefined;
}

function numberField(value: Record<string, unknown>, key: string): number | undefined {
  const field = value[key];
  return typeof field === "number" ? field : undefined;
}

/**
 * Remote attribute values may be numbers or booleans; the CLI works in strings.
 */
export function toAttributes(value: unknown): Attributes {
  if (!isRecord(value)) return {};

  const attributes: Attributes = {};
  for (const [key, raw] of Object.entries(value)) {
    if (
      typeof raw === "string" ||
      typeof raw === "number" ||
      typeof raw === "boolean"
    ) {
      attributes[key] = String(raw);
    }
  }
  return attributes;
}

export function toVectorStoreInfo(store: RemoteVectorStore): VectorStoreInfo {
  return {
    id: store.id,
    name: store.name,
    status: store.status,
    createdAt: store.created_at,
    usageBytes: store.usage_bytes,
    fileCounts: {
      inProgress: store.file_counts.in_progress,
      completed: store.file_counts.completed,
      failed: store.file_counts.failed,
      cancelled: store.file_counts.cancelled,
      total: store.file_counts.total,
    },
  };
}

export function toStoreFileInfo(file: RemoteStoreFile): StoreFileInfo {
  return {
    id: file.id,
    storeId: file.vector_store_id,
    status: file.status,
    createdAt: file.created_at,
    usageBytes: file.usage_bytes,
    attributes: toAttributes(file.attributes),
    lastError: file.last_error
      ? `${file.last_error.code}: ${file.last_error.message}`
      : undefined,
  };
}

export function toUploadedFile(file: RemoteFile): UploadedFile {
  return { id: file.id, fileName: file.filename, bytes: file.bytes };
}

export function toSearchHit(result: RemoteSearchResult): SearchHit {
  return {
    fileId: result.file_id,
    fileName: result.filename,
    score: result.score,
    attributes: toAttributes(result.attributes),
    text: result.content.map((part) => part.text).join("\n\n"),
  };
}

export function toConversationInfo(
  conversation: RemoteConversation
): ConversationInfo {
  return {
    id: conversation.id,
    createdAt: conversation.created_at,
    metadata: toAttributes(conversation.metadata),
  };
}

/**
 * Join the text parts of a message-like content array
 */
function contentText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";

  const parts: string[] = [];
  for (const part of content) {
    if (isRecord(part)) {
      const text = stringField(part, "text") ?? stringField(part, "refusal");
      if (text) parts.push(text);
    }
  }
  return parts.join("\n");
}

export function toConversationItem(item: unknown): ConversationItem {
  if (!isRecord(item)) {
    return { type: "unknown", text: "" };
  }

  return {
    id: stringField(item, "id"),
    type: stringField(item, "type") ?? "unknown",
    role: stringField(item, "role"),
    text: contentText(item["content"]),
  };
}

/**
 * Collect the retrieved chunks from every file_search_call output item.
 */
export function extractSearchResults(output: unknown[]): SearchHit[] {
  const hits: SearchHit[] = [];

  for (const item of output) {
    if (!isRecord(item) || item["type"] !== "file_search_call") continue;

    const results = item["results"];
    if (!Array.isArray(results)) continue;

    for (const result of results) {
      if (!isRecord(result)) continue;
      hits.push({
        fileId: stringField(result, "file_id") ?? "",
        fileName: stringField(result, "filename") ?? "",
        score: numberField(result, "score") ?? 0,
        attributes: toAttributes(result["attributes"]),
        text: stringField(result, "text") ?? "",
      });
    }
  }

  return hits;
}

/**
 * Collect file_citation annotations from the assistant message outputs.
 */
export function extractCitations(output: unknown[]): Citation[] {
  const citations: Citation[] = [];

  for (const item of output) {
    if (!isRecord(item) || item["type"] !== "message") continue;

    const content = item["content"];
    if (!Array.isArray(content)) continue;

    for (const part of content) {
      if (!isRecord(part)) continue;
      const annotations = part["annotations"];
      if (!Array.isArray(annotations)) continue;

      for (const annotation of annotations) {
        if (!isRecord(annotation) || annotation["type"] !== "file_citation") {
          continue;
        }
        citations.push({
          fileId: stringField(annotation, "file_id") ?? "",
          fileName: stringField(annotation, "filename") ?? "",
          index: numberField(annotation, "index") ?? 0,
        });
      }
    }
  }

  return citations;
}

export function toRagAnswer(response: RemoteResponse): RagAnswer {
  return {
    responseId: response.id,
    conversationId: response.conversation?.id,
    status: response.status ?? "unknown",
    model: response.model,
    text: response.output_text,
    citations: extractCitations(response.output),
    results: extractSearchResults(response.output),
  };
}
