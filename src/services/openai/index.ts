/**
 * OpenAI service - VectorStoreBackend on the official SDK
 */

export { createClient, FILE_PURPOSE, FILE_SEARCH_RESULTS_INCLUDE } from "./client.js";

export { OpenAIBackend, translateError } from "./backend.js";

export {
  toAttributes,
  toVectorStoreInfo,
  toStoreFileInfo,
  toUploadedFile,
  toSearchHit,
  toConversationInfo,
  toConversationItem,
  toRagAnswer,
  extractSearchResults,
  extractCitations,
} from "./mappers.js";

export type {
  RemoteVectorStore,
  RemoteStoreFile,
  RemoteFile,
  RemoteSearchResult,
  RemoteConversation,
  RemoteResponse,
} from "./mappers.js";
