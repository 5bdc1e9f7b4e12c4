import { InvalidArgumentError } from "../errors.js";
import { validateAttributes, type Attributes } from "../utils/attributes.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type {
  ConversationInfo,
  ConversationItem,
  VectorStoreBackend,
} from "./backend.js";

export interface ListItemsOptions {
  limit?: number;
  order?: "asc" | "desc";
}

export const DEFAULT_ITEM_LIMIT = 20;

/**
 * Conversation lifecycle. Each operation is a single remote call.
 */
export class ConversationService {
  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly logger: Logger = silentLogger
  ) {}

  async create(metadata: Attributes = {}): Promise<string> {
    const conversation = await this.backend.createConversation(
      validateAttributes(metadata)
    );
    this.logger.info(`Created conversation ${conversation.id}`);
    return conversation.id;
  }

  async get(conversationId: string): Promise<ConversationInfo> {
    return this.backend.retrieveConversation(conversationId);
  }

  async update(
    conversationId: string,
    metadata: Attributes
  ): Promise<ConversationInfo> {
    const updated = await this.backend.updateConversation(
      conversationId,
      validateAttributes(metadata)
    );
    this.logger.success(`Updated conversation ${conversationId}`);
    return updated;
  }

  async delete(conversationId: string): Promise<boolean> {
    const deleted = await this.backend.deleteConversation(conversationId);
    this.logger.info(`Deleted conversation ${conversationId}: ${deleted}`);
    return deleted;
  }

  /**
   * Timeline items (user, assistant and tool) of a conversation
   */
  async listItems(
    conversationId: string,
    options: ListItemsOptions = {}
  ): Promise<ConversationItem[]> {
    const limit = options.limit ?? DEFAULT_ITEM_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError("Item limit must be a positive integer");
    }
    return this.backend.listConversationItems(conversationId, {
      limit,
      order: options.order,
    });
  }
}
