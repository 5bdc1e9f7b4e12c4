import { beforeEach, describe, expect, it } from "vitest";
import {
  AmbiguousMatchError,
  InvalidArgumentError,
  NotFoundError,
} from "../src/errors.js";
import { StoreService } from "../src/services/stores.js";
import { MemoryBackend } from "./support/memoryBackend.js";

describe("StoreService", () => {
  let backend: MemoryBackend;
  let stores: StoreService;

  beforeEach(() => {
    backend = new MemoryBackend();
    stores = new StoreService(backend);
  });

  it("creates a store once and reuses it by name", async () => {
    const first = await stores.getOrCreate("Test-Store");
    const second = await stores.getOrCreate("  Test-Store ");

    expect(second).toBe(first);
    expect(backend.calls.filter((c) => c === "createVectorStore")).toHaveLength(1);
    expect(await stores.list()).toHaveLength(1);
  });

  it("rejects an empty store name", async () => {
    await expect(stores.getOrCreate("   ")).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    expect(backend.calls).toEqual([]);
  });

  it("matches names exactly", async () => {
    const id = await stores.getOrCreate("Policies");

    expect(await stores.getIdByName("Policies")).toBe(id);
    await expect(stores.getIdByName("policies")).rejects.toThrow(
      "No vector store found for 'policies'"
    );
  });

  it("reports duplicate store names as ambiguous", async () => {
    const a = await backend.createVectorStore("Shared");
    const b = await backend.createVectorStore("Shared");

    const error = await stores.getIdByName("Shared").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AmbiguousMatchError);
    expect(error).toHaveProperty("matches", [a.id, b.id]);
    await expect(stores.getOrCreate("Shared")).rejects.toBeInstanceOf(
      AmbiguousMatchError
    );
  });

  it("resolves ids as-is and names by lookup", async () => {
    const id = await stores.getOrCreate("Manuals");

    expect(await stores.resolveId("vs_unknown")).toBe("vs_unknown");
    expect(await stores.resolveId("Manuals")).toBe(id);
  });

  it("deletes a store, after which it is not found", async () => {
    const id = await stores.getOrCreate("Temporary");

    expect(await stores.delete(id)).toBe(true);
    await expect(stores.getIdByName("Temporary")).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(stores.get(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports an already deleted store as not found", async () => {
    const id = await stores.getOrCreate("Once");

    await stores.delete(id);

    await expect(stores.delete(id)).rejects.toThrow(
      `No vector store found for '${id}'`
    );
  });

  it("returns false when deletion is not confirmed", async () => {
    const id = await stores.getOrCreate("Sticky");
    backend.confirmDeletes = false;

    expect(await stores.delete(id)).toBe(false);
  });
});
