import { describe, it, expect, vi, beforeEach } from "vitest";

const { search, getCollections } = vi.hoisted(() => ({
  search: vi.fn(),
  getCollections: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {
    search = search;
    getCollections = getCollections;
  },
}));

import { QdrantVectorStore } from "./qdrant-adapter.js";

function createStore(): QdrantVectorStore {
  return new QdrantVectorStore({ url: "http://localhost:6333", collection: "benchmarks" });
}

describe("QdrantVectorStore", () => {
  beforeEach(() => {
    search.mockReset();
    getCollections.mockReset();
  });

  it("asks for payloads and stored vectors", async () => {
    search.mockResolvedValue([]);

    await createStore().nearest([0.1, 0.2], 20);

    expect(search).toHaveBeenCalledWith("benchmarks", {
      vector: [0.1, 0.2],
      limit: 20,
      with_payload: true,
      with_vector: true,
    });
  });

  it("maps points to candidates and keeps extra payload as metadata", async () => {
    search.mockResolvedValue([
      {
        id: 7,
        version: 1,
        score: 0.83,
        vector: [1, 0],
        payload: {
          chunkId: "cis-ubuntu-2.2.1",
          source: "CIS Ubuntu Linux Benchmark",
          content: "Ensure DHCP Server is not installed.",
          page: 112,
        },
      },
    ]);

    const candidates = await createStore().nearest([1, 0], 5);

    expect(candidates).toEqual([
      {
        chunkId: "cis-ubuntu-2.2.1",
        source: "CIS Ubuntu Linux Benchmark",
        content: "Ensure DHCP Server is not installed.",
        embedding: [1, 0],
        storeScore: 0.83,
        metadata: { page: 112 },
      },
    ]);
  });

  it("falls back to the point id and an unknown source", async () => {
    search.mockResolvedValue([{ id: "p-1", version: 1, score: 0.5, vector: [0, 1], payload: null }]);

    const [candidate] = await createStore().nearest([0, 1], 5);

    expect(candidate?.chunkId).toBe("p-1");
    expect(candidate?.source).toBe("unknown");
    expect(candidate?.content).toBe("");
    expect(candidate?.metadata).toEqual({});
  });

  it("rejects points returned without a dense vector", async () => {
    search.mockResolvedValue([{ id: 3, version: 1, score: 0.5, vector: null, payload: {} }]);

    await expect(createStore().nearest([0, 1], 5)).rejects.toThrow(
      "Point 3 in benchmarks has no dense vector",
    );
  });

  it("reports health from the collections endpoint", async () => {
    getCollections.mockResolvedValueOnce({ collections: [] });
    getCollections.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    const store = createStore();

    await expect(store.healthCheck()).resolves.toBe(true);
    await expect(store.healthCheck()).resolves.toBe(false);
  });
});
