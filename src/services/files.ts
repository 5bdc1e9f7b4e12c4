import {
  AmbiguousMatchError,
  DuplicateFileError,
  errorMessage,
  InvalidArgumentError,
  NotFoundError,
  RemoteAPIError,
} from "../errors.js";
import { validateAttributes, type Attributes } from "../utils/attributes.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type {
  ChunkingOptions,
  FileUpload,
  SearchHit,
  StoreFileInfo,
  VectorStoreBackend,
} from "./backend.js";
import { readSource, type Fetcher } from "./uploads.js";

/**
 * Attribute holding the original file name of an attached file
 */
export const FILE_NAME_ATTRIBUTE = "file_name";

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChunkSize: 800,
  chunkOverlap: 400,
};

export const DEFAULT_TOP_K = 10;

export interface SemanticRetrieveOptions {
  topK?: number;
  rewriteQuery?: boolean;
  scoreThreshold?: number;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Files inside vector stores: upload and attach, find, tag, detach, search.
 */
export class FileService {
  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly logger: Logger = silentLogger,
    private readonly fetcher?: Fetcher
  ) {}

  /**
   * Read a local path or URL into an upload without any remote call.
   */
  async readSource(source: string): Promise<FileUpload> {
    const upload = await readSource(source, this.fetcher);
    this.logger.debug(
      `Read ${upload.fileName} (${upload.content.length} bytes, ${upload.mimeType ?? "unknown type"})`
    );
    return upload;
  }

  /**
   * Upload a local file or URL and attach it to the store.
   * The source is read and validated before any remote call is made.
   * When attaching fails, the attachment and the uploaded file are removed
   * so the same name can be uploaded again.
   */
  async uploadAndAdd(
    storeId: string,
    source: string | FileUpload,
    attributes: Attributes = {},
    chunking: Partial<ChunkingOptions> = {}
  ): Promise<StoreFileInfo> {
    const upload =
      typeof source === "string" ? await this.readSource(source) : source;

    const merged = validateAttributes({
      [FILE_NAME_ATTRIBUTE]: upload.fileName,
      ...attributes,
    });

    const duplicates = await this.matchByName(storeId, upload.fileName);
    if (duplicates.length > 0) {
      throw new DuplicateFileError(upload.fileName, storeId, duplicates[0].id);
    }

    this.logger.info(`Uploading ${upload.fileName}...`);
    const uploaded = await this.backend.uploadFile(upload);

    this.logger.info(
      `Attaching file ${uploaded.id} to vector store ${storeId}...`
    );
    let attached: StoreFileInfo;
    try {
      attached = await this.backend.attachFile(storeId, {
        fileId: uploaded.id,
        attributes: merged,
        chunking: { ...DEFAULT_CHUNKING, ...chunking },
      });
    } catch (error) {
      await this.discard(storeId, uploaded.id);
      throw error;
    }

    if (attached.status === "failed") {
      await this.discard(storeId, uploaded.id);
      throw new RemoteAPIError(
        `Processing of ${upload.fileName} failed${attached.lastError ? `: ${attached.lastError}` : ""}`
      );
    }

    this.logger.success(
      `Attached ${upload.fileName} to vector store ${storeId} (${attached.id})`
    );
    return attached;
  }

  /**
   * Detach and delete a file whose attachment failed.
   * Cleanup failures are logged; the attach error is what the caller sees.
   */
  private async discard(storeId: string, fileId: string): Promise<void> {
    const steps: Array<[string, () => Promise<boolean>]> = [
      [
        `detach file ${fileId}`,
        () => this.backend.deleteStoreFile(storeId, fileId),
      ],
      [`delete uploaded file ${fileId}`, () => this.backend.deleteFile(fileId)],
    ];

    for (const [label, step] of steps) {
      try {
        await step();
        this.logger.debug(`Cleanup: ${label}`);
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          this.logger.warn(`Could not ${label}: ${errorMessage(error)}`);
        }
      }
    }
  }

  async list(storeId: string): Promise<StoreFileInfo[]> {
    this.logger.debug(`Fetching files of vector store ${storeId}...`);
    const files = await this.backend.listStoreFiles(storeId);
    this.logger.debug(`Found ${files.length} file(s)`);
    return files;
  }

  /**
   * Find an attached file by its original name, case-insensitively.
   */
  async findIdByName(storeId: string, fileName: string): Promise<string> {
    const matches = await this.matchByName(storeId, fileName);

    if (matches.length === 0) {
      throw new NotFoundError("file", fileName);
    }
    if (matches.length > 1) {
      throw new AmbiguousMatchError(
        "file",
        fileName,
        matches.map((file) => file.id)
      );
    }
    return matches[0].id;
  }

  /**
   * Replace the attributes of an attached file.
   * The stored file name survives unless the new attributes set it.
   */
  async updateAttrs(
    storeId: string,
    fileId: string,
    attributes: Attributes
  ): Promise<StoreFileInfo> {
    const current = await this.backend.retrieveStoreFile(storeId, fileId);
    const fileName = current.attributes[FILE_NAME_ATTRIBUTE];

    const next = validateAttributes(
      fileName === undefined
        ? { ...attributes }
        : { [FILE_NAME_ATTRIBUTE]: fileName, ...attributes }
    );

    this.logger.info(`Updating attributes of file ${fileId}...`);
    const updated = await this.backend.updateStoreFileAttributes(
      storeId,
      fileId,
      next
    );
    this.logger.success(`Updated file ${fileId}`);
    return updated;
  }

  async delete(storeId: string, fileId: string): Promise<boolean> {
    this.logger.info(`Deleting file ${fileId} from vector store ${storeId}...`);
    const deleted = await this.backend.deleteStoreFile(storeId, fileId);
    if (deleted) {
      this.logger.success(`Deleted file ${fileId}`);
    } else {
      this.logger.warn(`Deletion of file ${fileId} was not confirmed`);
    }
    return deleted;
  }

  /**
   * Similarity search against the store. Hits keep the remote ranking.
   */
  async semanticRetrieve(
    storeId: string,
    query: string,
    options: SemanticRetrieveOptions = {}
  ): Promise<SearchHit[]> {
    if (!query.trim()) {
      throw new InvalidArgumentError("Search query must not be empty");
    }

    this.logger.debug(`Searching vector store ${storeId} for "${query}"`);
    return this.backend.searchVectorStore(storeId, {
      query,
      maxResults: options.topK ?? DEFAULT_TOP_K,
      rewriteQuery: options.rewriteQuery ?? false,
      scoreThreshold: options.scoreThreshold,
    });
  }

  private async matchByName(
    storeId: string,
    fileName: string
  ): Promise<StoreFileInfo[]> {
    const wanted = normalizeName(fileName);
    const files = await this.list(storeId);
    return files.filter((file) => {
      const stored = file.attributes[FILE_NAME_ATTRIBUTE];
      return stored !== undefined && normalizeName(stored) === wanted;
    });
  }
}
