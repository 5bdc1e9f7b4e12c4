/**
 * Capability interface over the hosted vector-store API.
 *
 * Services only talk to the remote provider through this interface, so the
 * CLI can run against the OpenAI SDK in production and an in-process fake
 * in tests. Implementations throw NotFoundError for missing resources and
 * RemoteAPIError for every other provider failure.
 */

import type { Attributes } from "../utils/attributes.js";

export interface FileCounts {
  inProgress: number;
  completed: number;
  failed: number;
  cancelled: number;
  total: number;
}

export interface VectorStoreInfo {
  id: string;
  name: string;
  status: string;
  createdAt: number;
  usageBytes: number;
  fileCounts: FileCounts;
}

export interface StoreFileInfo {
  id: string;
  storeId: string;
  status: string;
  createdAt: number;
  usageBytes: number;
  attributes: Attributes;
  lastError?: string;
}

/**
 * Raw bytes ready to be uploaded to the provider
 */
export interface FileUpload {
  fileName: string;
  content: Buffer;
  mimeType?: string;
}

export interface UploadedFile {
  id: string;
  fileName: string;
  bytes: number;
}

/**
 * Static chunking hints, in tokens
 */
export interface ChunkingOptions {
  maxChunkSize: number;
  chunkOverlap: number;
}

export interface AttachFileRequest {
  fileId: string;
  attributes: Attributes;
  chunking: ChunkingOptions;
}

export interface SearchRequest {
  query: string;
  maxResults: number;
  rewriteQuery: boolean;
  scoreThreshold?: number;
}

export interface SearchHit {
  fileId: string;
  fileName: string;
  score: number;
  attributes: Attributes;
  text: string;
}

export interface ConversationInfo {
  id: string;
  createdAt: number;
  metadata: Attributes;
}

export interface ConversationItem {
  id?: string;
  type: string;
  role?: string;
  text: string;
}

export interface ListItemsRequest {
  limit: number;
  order?: "asc" | "desc";
}

export interface RagRequest {
  model: string;
  input: string;
  conversationId: string;
  storeIds: string[];
  instructions?: string;
  maxResults?: number;
  scoreThreshold?: number;
  metadata?: Attributes;
}

export interface Citation {
  fileId: string;
  fileName: string;
  index: number;
}

export interface RagAnswer {
  responseId: string;
  conversationId?: string;
  status: string;
  model: string;
  text: string;
  citations: Citation[];
  results: SearchHit[];
}

export interface VectorStoreBackend {
  listVectorStores(): Promise<VectorStoreInfo[]>;
  createVectorStore(name: string): Promise<VectorStoreInfo>;
  retrieveVectorStore(storeId: string): Promise<VectorStoreInfo>;
  deleteVectorStore(storeId: string): Promise<boolean>;

  uploadFile(upload: FileUpload): Promise<UploadedFile>;
  deleteFile(fileId: string): Promise<boolean>;
  attachFile(storeId: string, request: AttachFileRequest): Promise<StoreFileInfo>;
  listStoreFiles(storeId: string): Promise<StoreFileInfo[]>;
  retrieveStoreFile(storeId: string, fileId: string): Promise<StoreFileInfo>;
  updateStoreFileAttributes(
    storeId: string,
    fileId: string,
    attributes: Attributes
  ): Promise<StoreFileInfo>;
  deleteStoreFile(storeId: string, fileId: string): Promise<boolean>;
  searchVectorStore(storeId: string, request: SearchRequest): Promise<SearchHit[]>;

  createConversation(metadata: Attributes): Promise<ConversationInfo>;
  retrieveConversation(conversationId: string): Promise<ConversationInfo>;
  updateConversation(
    conversationId: string,
    metadata: Attributes
  ): Promise<ConversationInfo>;
  deleteConversation(conversationId: string): Promise<boolean>;
  listConversationItems(
    conversationId: string,
    request: ListItemsRequest
  ): Promise<ConversationItem[]>;

  createRagResponse(request: RagRequest): Promise<RagAnswer>;
  retrieveResponse(responseId: string): Promise<RagAnswer>;
  cancelResponse(responseId: string): Promise<RagAnswer>;
}
