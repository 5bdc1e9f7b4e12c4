import type {
  ConversationInfo,
  ConversationItem,
  FileUpload,
  SearchHit,
  StoreFileInfo,
  VectorStoreInfo,
} from "../services/backend.js";
import type { Attributes } from "./attributes.js";

const PREVIEW_LENGTH = 200;

/**
 * Format a unix timestamp (seconds) as `YYYY-MM-DD HH:MM:SS` UTC
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Render `key=value` pairs, skipping the given keys
 */
export function formatAttributes(
  attributes: Attributes,
  skip: string[] = []
): string {
  return Object.entries(attributes)
    .filter(([key]) => !skip.includes(key))
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}

/**
 * Render rows as a plain aligned table with a header rule
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length))
  );

  const line = (cells: string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join("  ")
      .trimEnd();

  return [
    line(headers),
    widths.map((width) => "─".repeat(width)).join("  "),
    ...rows.map(line),
  ].join("\n");
}

export function formatStores(stores: VectorStoreInfo[]): string {
  if (stores.length === 0) {
    return "📭 No vector stores found.";
  }

  return renderTable(
    ["ID", "NAME", "FILES", "STATUS", "CREATED"],
    stores.map((store) => [
      store.id,
      store.name,
      `${store.fileCounts.completed}/${store.fileCounts.total}`,
      store.status,
      formatTimestamp(store.createdAt),
    ])
  );
}

export function formatStoreDetails(store: VectorStoreInfo): string {
  const counts = store.fileCounts;
  return [
    `ID:       ${store.id}`,
    `Name:     ${store.name}`,
    `Status:   ${store.status}`,
    `Created:  ${formatTimestamp(store.createdAt)}`,
    `Usage:    ${store.usageBytes} bytes`,
    `Files:    ${counts.total} total, ${counts.completed} completed, ${counts.inProgress} in progress, ${counts.failed} failed, ${counts.cancelled} cancelled`,
  ].join("\n");
}

export function formatFiles(files: StoreFileInfo[], nameKey: string): string {
  if (files.length === 0) {
    return "📭 No files in this vector store.";
  }

  return renderTable(
    ["ID", "FILE NAME", "STATUS", "ATTRIBUTES", "CREATED"],
    files.map((file) => [
      file.id,
      file.attributes[nameKey] ?? "",
      file.status,
      formatAttributes(file.attributes, [nameKey]),
      formatTimestamp(file.createdAt),
    ])
  );
}

export function formatUpload(upload: FileUpload): string {
  return [
    `Name:     ${upload.fileName}`,
    `Type:     ${upload.mimeType ?? "unknown"}`,
    `Size:     ${upload.content.length} bytes`,
  ].join("\n");
}

/**
 * Format a search hit for display
 */
export function formatHit(hit: SearchHit, index: number, nameKey: string): string {
  const lines: string[] = [];
  lines.push(`${index + 1}. ${hit.fileName} (score: ${hit.score.toFixed(4)})`);

  const attributes = formatAttributes(hit.attributes, [nameKey]);
  if (attributes) {
    lines.push(`   🏷️  ${attributes}`);
  }

  const preview = hit.text.replace(/\s+/g, " ").trim();
  lines.push(
    `   ${preview.slice(0, PREVIEW_LENGTH)}${preview.length > PREVIEW_LENGTH ? "..." : ""}`
  );

  return lines.join("\n");
}

export function formatConversation(conversation: ConversationInfo): string {
  const metadata = formatAttributes(conversation.metadata);
  return [
    `ID:       ${conversation.id}`,
    `Created:  ${formatTimestamp(conversation.createdAt)}`,
    `Metadata: ${metadata || "(none)"}`,
  ].join("\n");
}

export function formatConversationItem(item: ConversationItem): string {
  const who = item.role ? `${item.type}/${item.role}` : item.type;
  const text = item.text.replace(/\s+/g, " ").trim();
  return `[${who}]${item.id ? ` ${item.id}` : ""}${text ? `: ${text}` : ""}`;
}
