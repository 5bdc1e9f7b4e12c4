import type { Config } from "../config.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { VectorStoreBackend } from "./backend.js";
import { ConversationService } from "./conversations.js";
import { FileService } from "./files.js";
import { createClient, OpenAIBackend } from "./openai/index.js";
import { ResponseRAGService } from "./responses.js";
import { StoreService } from "./stores.js";

export interface Services {
  stores: StoreService;
  files: FileService;
  conversations: ConversationService;
  responses: ResponseRAGService;
}

export function createServices(
  backend: VectorStoreBackend,
  config: Pick<Config, "model">,
  logger: Logger = silentLogger
): Services {
  return {
    stores: new StoreService(backend, logger),
    files: new FileService(backend, logger),
    conversations: new ConversationService(backend, logger),
    responses: new ResponseRAGService(backend, config.model, logger),
  };
}

/**
 * Production wiring: OpenAI client -> backend -> services
 */
export function createOpenAIServices(config: Config, logger?: Logger): Services {
  return createServices(new OpenAIBackend(createClient(config)), config, logger);
}

export type {
  VectorStoreBackend,
  VectorStoreInfo,
  StoreFileInfo,
  SearchHit,
  ConversationInfo,
  ConversationItem,
  RagAnswer,
  Citation,
  ChunkingOptions,
  FileUpload,
} from "./backend.js";
export { StoreService, STORE_ID_PREFIX } from "./stores.js";
export {
  FileService,
  FILE_NAME_ATTRIBUTE,
  DEFAULT_CHUNKING,
  DEFAULT_TOP_K,
} from "./files.js";
export { ConversationService } from "./conversations.js";
export {
  ResponseRAGService,
  DEFAULT_RAG_INSTRUCTIONS,
  requireQuestion,
} from "./responses.js";
