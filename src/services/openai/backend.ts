import OpenAI, { APIError, OpenAIError, toFile } from "openai";
import {
  NotFoundError,
  RemoteAPIError,
  type ResourceKind,
} from "../../errors.js";
import type { Attributes } from "../../utils/attributes.js";
import type {
  AttachFileRequest,
  ConversationInfo,
  ConversationItem,
  FileUpload,
  ListItemsRequest,
  RagAnswer,
  RagRequest,
  SearchHit,
  SearchRequest,
  StoreFileInfo,
  UploadedFile,
  VectorStoreBackend,
  VectorStoreInfo,
} from "../backend.js";
import { FILE_PURPOSE, FILE_SEARCH_RESULTS_INCLUDE } from "./client.js";
import {
  toConversationInfo,
  toConversationItem,
  toRagAnswer,
  toSearchHit,
  toStoreFileInfo,
  toUploadedFile,
  toVectorStoreInfo,
} from "./mappers.js";

/**
 * Page size used when walking list endpoints
 */
const PAGE_SIZE = 100;

/**
 * Translate an SDK failure into the CLI error taxonomy.
 * A 404 becomes NotFoundError for the resource being addressed.
 */
export function translateError(
  error: unknown,
  resource?: ResourceKind,
  key?: string
): unknown {
  if (error instanceof APIError) {
    if (error.status === 404 && resource && key !== undefined) {
      return new NotFoundError(resource, key, { cause: error });
    }
    return new RemoteAPIError(error.message, error.status, { cause: error });
  }
  if (error instanceof OpenAIError) {
    return new RemoteAPIError(error.message, undefined, { cause: error });
  }
  return error;
}

async function call<T>(
  operation: () => Promise<T>,
  resource?: ResourceKind,
  key?: string
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateError(error, resource, key);
  }
}

/**
 * VectorStoreBackend on the official OpenAI SDK.
 */
export class OpenAIBackend implements VectorStoreBackend {
  constructor(private readonly client: OpenAI) {}

  listVectorStores(): Promise<VectorStoreInfo[]> {
    return call(async () => {
      const stores: VectorStoreInfo[] = [];
      for await (const store of this.client.vectorStores.list({
        limit: PAGE_SIZE,
      })) {
        stores.push(toVectorStoreInfo(store));
      }
      return stores;
    });
  }

  createVectorStore(name: string): Promise<VectorStoreInfo> {
    return call(async () =>
      toVectorStoreInfo(await this.client.vectorStores.create({ name }))
    );
  }

  retrieveVectorStore(storeId: string): Promise<VectorStoreInfo> {
    return call(
      async () =>
        toVectorStoreInfo(await this.client.vectorStores.retrieve(storeId)),
      "vector store",
      storeId
    );
  }

  deleteVectorStore(storeId: string): Promise<boolean> {
    return call(
      async () => (await this.client.vectorStores.delete(storeId)).deleted,
      "vector store",
      storeId
    );
  }

  uploadFile(upload: FileUpload): Promise<UploadedFile> {
    return call(async () => {
      const file = await toFile(upload.content, upload.fileName, {
        type: upload.mimeType,
      });
      const created = await this.client.files.create({
        file,
        purpose: FILE_PURPOSE,
      });
      return toUploadedFile(created);
    });
  }

  deleteFile(fileId: string): Promise<boolean> {
    return call(
      async () => (await this.client.files.delete(fileId)).deleted,
      "file",
      fileId
    );
  }

  attachFile(
    storeId: string,
    request: AttachFileRequest
  ): Promise<StoreFileInfo> {
    return call(
      async () => {
        const attached = await this.client.vectorStores.files.createAndPoll(
          storeId,
          {
            file_id: request.fileId,
            attributes: request.attributes,
            chunking_strategy: {
              type: "static",
              static: {
                max_chunk_size_tokens: request.chunking.maxChunkSize,
                chunk_overlap_tokens: request.chunking.chunkOverlap,
              },
            },
          }
        );
        return toStoreFileInfo(attached);
      },
      "vector store",
      storeId
    );
  }

  listStoreFiles(storeId: string): Promise<StoreFileInfo[]> {
    return call(
      async () => {
        const files: StoreFileInfo[] = [];
        for await (const file of this.client.vectorStores.files.list(storeId, {
          limit: PAGE_SIZE,
        })) {
          files.push(toStoreFileInfo(file));
        }
        return files;
      },
      "vector store",
      storeId
    );
  }

  retrieveStoreFile(storeId: string, fileId: string): Promise<StoreFileInfo> {
    return call(
      async () =>
        toStoreFileInfo(
          await this.client.vectorStores.files.retrieve(fileId, {
            vector_store_id: storeId,
          })
        ),
      "file",
      fileId
    );
  }

  updateStoreFileAttributes(
    storeId: string,
    fileId: string,
    attributes: Attributes
  ): Promise<StoreFileInfo> {
    return call(
      async () =>
        toStoreFileInfo(
          await this.client.vectorStores.files.update(fileId, {
            vector_store_id: storeId,
            attributes,
          })
        ),
      "file",
      fileId
    );
  }

  deleteStoreFile(storeId: string, fileId: string): Promise<boolean> {
    return call(
      async () =>
        (
          await this.client.vectorStores.files.delete(fileId, {
            vector_store_id: storeId,
          })
        ).deleted,
      "file",
      fileId
    );
  }

  searchVectorStore(
    storeId: string,
    request: SearchRequest
  ): Promise<SearchHit[]> {
    return call(
      async () => {
        const hits: SearchHit[] = [];
        const page = this.client.vectorStores.search(storeId, {
          query: request.query,
          max_num_results: request.maxResults,
          rewrite_query: request.rewriteQuery,
          ranking_options:
            request.scoreThreshold === undefined
              ? undefined
              : { score_threshold: request.scoreThreshold },
        });
        for await (const result of page) {
          hits.push(toSearchHit(result));
        }
        return hits;
      },
      "vector store",
      storeId
    );
  }

  createConversation(metadata: Attributes): Promise<ConversationInfo> {
    return call(async () =>
      toConversationInfo(await this.client.conversations.create({ metadata }))
    );
  }

  retrieveConversation(conversationId: string): Promise<ConversationInfo> {
    return call(
      async () =>
        toConversationInfo(
          await this.client.conversations.retrieve(conversationId)
        ),
      "conversation",
      conversationId
    );
  }

  updateConversation(
    conversationId: string,
    metadata: Attributes
  ): Promise<ConversationInfo> {
    return call(
      async () =>
        toConversationInfo(
          await this.client.conversations.update(conversationId, { metadata })
        ),
      "conversation",
      conversationId
    );
  }

  deleteConversation(conversationId: string): Promise<boolean> {
    return call(
      async () =>
        (await this.client.conversations.delete(conversationId)).deleted,
      "conversation",
      conversationId
    );
  }

  listConversationItems(
    conversationId: string,
    request: ListItemsRequest
  ): Promise<ConversationItem[]> {
    return call(
      async () => {
        const items: ConversationItem[] = [];
        const page = this.client.conversations.items.list(conversationId, {
          limit: Math.min(request.limit, PAGE_SIZE),
          order: request.order,
        });
        for await (const item of page) {
          items.push(toConversationItem(item));
          if (items.length >= request.limit) break;
        }
        return items;
      },
      "conversation",
      conversationId
    );
  }

  /**
   * A 404 may concern the conversation or any of the stores; it stays a RemoteAPIError.
   */
  createRagResponse(request: RagRequest): Promise<RagAnswer> {
    return call(async () => {
      const response = await this.client.responses.create({
        model: request.model,
        input: request.input,
        conversation: request.conversationId,
        instructions: request.instructions,
        metadata: request.metadata,
        include: [FILE_SEARCH_RESULTS_INCLUDE],
        tools: [
          {
            type: "file_search",
            vector_store_ids: request.storeIds,
            max_num_results: request.maxResults,
            ranking_options:
              request.scoreThreshold === undefined
                ? undefined
                : { ranker: "auto", score_threshold: request.scoreThreshold },
          },
        ],
      });
      return toRagAnswer(response);
    });
  }

  retrieveResponse(responseId: string): Promise<RagAnswer> {
    return call(
      async () => toRagAnswer(await this.client.responses.retrieve(responseId)),
      "response",
      responseId
    );
  }

  cancelResponse(responseId: string): Promise<RagAnswer> {
    return call(
      async () => toRagAnswer(await this.client.responses.cancel(responseId)),
      "response",
      responseId
    );
  }
}
