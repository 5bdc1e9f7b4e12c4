import { InvalidArgumentError } from "../errors.js";
import type { Attributes } from "../utils/attributes.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { RagAnswer, VectorStoreBackend } from "./backend.js";

/**
 * Default instructions for RAG answers
 */
export const DEFAULT_RAG_INSTRUCTIONS = `You are a helpful RAG assistant.

Only answer questions using information returned by the file_search tool.
If file_search returns no result or lacks enough information, reply only: "No Answer."
Do not guess or use outside knowledge.
If a retrieved table is relevant, you may include it in Markdown.
Keep answers accurate, concise and clearly structured, in the language of the user.`;

/**
 * Reject a blank question before anything is created remotely
 */
export function requireQuestion(query: string): string {
  if (!query.trim()) {
    throw new InvalidArgumentError("Question must not be empty");
  }
  return query;
}

export interface AskOptions {
  model?: string;
  topK?: number;
  scoreThreshold?: number;
  instructions?: string;
  metadata?: Attributes;
}

/**
 * Retrieval-augmented answers through the Responses API file_search tool,
 * continuing a conversation and scoped to one vector store.
 */
export class ResponseRAGService {
  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly defaultModel: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async ask(
    storeId: string,
    conversationId: string,
    query: string,
    options: AskOptions = {}
  ): Promise<RagAnswer> {
    if (!storeId) {
      throw new InvalidArgumentError("A vector store id is required");
    }
    if (!conversationId) {
      throw new InvalidArgumentError("A conversation id is required");
    }
    requireQuestion(query);

    const model = options.model ?? this.defaultModel;
    this.logger.debug(
      `Creating RAG response with ${model} on ${storeId} in ${conversationId}`
    );

    const answer = await this.backend.createRagResponse({
      model,
      input: query,
      conversationId,
      storeIds: [storeId],
      instructions: options.instructions ?? DEFAULT_RAG_INSTRUCTIONS,
      maxResults: options.topK,
      scoreThreshold: options.scoreThreshold,
      metadata: options.metadata,
    });

    this.logger.debug(
      `Response ${answer.responseId}: ${answer.results.length} retrieved chunk(s), ${answer.citations.length} citation(s)`
    );
    return answer;
  }

  async get(responseId: string): Promise<RagAnswer> {
    return this.backend.retrieveResponse(responseId);
  }

  async cancel(responseId: string): Promise<RagAnswer> {
    const answer = await this.backend.cancelResponse(responseId);
    this.logger.info(`Response ${responseId} is ${answer.status}`);
    return answer;
  }

  /**
   * Sorted unique file names referenced by an answer
   */
  static extractSources(answer: RagAnswer): string[] {
    const names = new Set<string>();
    for (const hit of answer.results) {
      if (hit.fileName) names.add(hit.fileName);
    }
    for (const citation of answer.citations) {
      if (citation.fileName) names.add(citation.fileName);
    }
    return Array.from(names).sort();
  }
}
