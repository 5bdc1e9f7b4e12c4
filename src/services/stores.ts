import {
  AmbiguousMatchError,
  InvalidArgumentError,
  NotFoundError,
} from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { VectorStoreBackend, VectorStoreInfo } from "./backend.js";

/**
 * Vector store ids issued by the provider carry this prefix
 */
export const STORE_ID_PREFIX = "vs_";

/**
 * Lifecycle of vector stores: create, look up by name, list, delete.
 */
export class StoreService {
  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Return the id of the store with this name, creating it when absent.
   * Concurrent callers may still race; uniqueness is not enforced locally.
   */
  async getOrCreate(name: string): Promise<string> {
    const storeName = name.trim();
    if (!storeName) {
      throw new InvalidArgumentError("Store name must not be empty");
    }

    const existing = await this.findByName(storeName);
    if (existing.length > 0) {
      const id = this.single(storeName, existing);
      this.logger.info(`Reusing vector store '${storeName}' (${id})`);
      return id;
    }

    this.logger.info(`Creating vector store '${storeName}'...`);
    const created = await this.backend.createVectorStore(storeName);
    this.logger.success(`Created vector store '${storeName}' (${created.id})`);
    return created.id;
  }

  async list(): Promise<VectorStoreInfo[]> {
    this.logger.debug("Fetching all vector stores...");
    const stores = await this.backend.listVectorStores();
    this.logger.debug(`Found ${stores.length} vector store(s)`);
    return stores;
  }

  async get(storeId: string): Promise<VectorStoreInfo> {
    this.logger.debug(`Fetching vector store ${storeId}...`);
    return this.backend.retrieveVectorStore(storeId);
  }

  async getIdByName(name: string): Promise<string> {
    const storeName = name.trim();
    const matches = await this.findByName(storeName);
    if (matches.length === 0) {
      throw new NotFoundError("vector store", storeName);
    }
    return this.single(storeName, matches);
  }

  /**
   * Accept either a store id or a store name.
   */
  async resolveId(idOrName: string): Promise<string> {
    const value = idOrName.trim();
    if (value.startsWith(STORE_ID_PREFIX)) {
      return value;
    }
    return this.getIdByName(value);
  }

  async delete(storeId: string): Promise<boolean> {
    this.logger.info(`Deleting vector store ${storeId}...`);
    const deleted = await this.backend.deleteVectorStore(storeId);
    if (deleted) {
      this.logger.success(`Deleted vector store ${storeId}`);
    } else {
      this.logger.warn(`Deletion of vector store ${storeId} was not confirmed`);
    }
    return deleted;
  }

  private async findByName(name: string): Promise<VectorStoreInfo[]> {
    const stores = await this.list();
    return stores.filter((store) => store.name.trim() === name);
  }

  private single(name: string, matches: VectorStoreInfo[]): string {
    if (matches.length > 1) {
      throw new AmbiguousMatchError(
        "vector store",
        name,
        matches.map((store) => store.id)
      );
    }
    return matches[0].id;
  }
}
