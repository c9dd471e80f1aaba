/**
 * Shared mock for @qdrant/js-client-rest
 *
 * Mocks the low-level HTTP client, allowing tests to use the real QdrantManager.
 *
 * Usage:
 *   vi.mock("@qdrant/js-client-rest", async () => {
 *     const { MockQdrantClient } = await import("../mocks/qdrant-client.js");
 *     return { QdrantClient: MockQdrantClient };
 *   });
 */

import { vi } from "vitest";

type PointId = string | number;

export interface MockPointData {
  id: PointId;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface MockCollectionData {
  vectorSize: number;
  distance: string;
  indexingThreshold: number;
}

/**
 * In-memory storage for mock Qdrant data, shared by every client instance
 */
export class MockQdrantStorage {
  collections = new Map<string, MockCollectionData>();
  points = new Map<string, MockPointData[]>();
  /** Point ids of each delete request, in call order */
  deleteRequests: PointId[][] = [];
  /** indexing_threshold values sent through updateCollection */
  thresholdUpdates: number[] = [];
  /** When set, the next upsert/delete/updateCollection rejects with it */
  failNext: { operation: "upsert" | "delete" | "updateCollection"; error: unknown } | null = null;

  clear(): void {
    this.collections.clear();
    this.points.clear();
    this.deleteRequests = [];
    this.thresholdUpdates = [];
    this.failNext = null;
  }

  getPoints(collectionName: string): MockPointData[] {
    return this.points.get(collectionName) ?? [];
  }

  takeFailure(operation: "upsert" | "delete" | "updateCollection"): unknown {
    if (this.failNext?.operation !== operation) {
      return undefined;
    }
    const { error } = this.failNext;
    this.failNext = null;
    return error;
  }
}

export const mockStorage = new MockQdrantStorage();

function notFound(): unknown {
  return { status: 404, data: { status: { error: "Collection not found" } } };
}

function sortedPoints(collectionName: string): MockPointData[] {
  return [...mockStorage.getPoints(collectionName)].sort((a, b) =>
    String(a.id).localeCompare(String(b.id)),
  );
}

export class MockQdrantClient {
  getCollections = vi.fn(async () => ({
    collections: Array.from(mockStorage.collections.keys()).map((name) => ({ name })),
  }));

  getCollection = vi.fn(async (name: string) => {
    const collection = mockStorage.collections.get(name);
    if (!collection) {
      throw notFound();
    }
    return {
      points_count: mockStorage.getPoints(name).length,
      config: {
        params: {
          vectors: { size: collection.vectorSize, distance: collection.distance },
        },
        optimizer_config: {
          indexing_threshold: collection.indexingThreshold,
        },
      },
    };
  });

  createCollection = vi.fn(
    async (name: string, config: { vectors: { size: number; distance: string } }) => {
      mockStorage.collections.set(name, {
        vectorSize: config.vectors.size,
        distance: config.vectors.distance,
        indexingThreshold: 20000,
      });
      mockStorage.points.set(name, []);
      return true;
    },
  );

  updateCollection = vi.fn(
    async (name: string, config: { optimizers_config?: { indexing_threshold?: number } }) => {
      const failure = mockStorage.takeFailure("updateCollection");
      if (failure !== undefined) {
        throw failure;
      }
      const collection = mockStorage.collections.get(name);
      if (!collection) {
        throw notFound();
      }
      const threshold = config.optimizers_config?.indexing_threshold;
      if (threshold !== undefined) {
        collection.indexingThreshold = threshold;
        mockStorage.thresholdUpdates.push(threshold);
      }
      return true;
    },
  );

  upsert = vi.fn(async (collectionName: string, { points }: { points: MockPointData[] }) => {
    const failure = mockStorage.takeFailure("upsert");
    if (failure !== undefined) {
      throw failure;
    }
    if (!mockStorage.collections.has(collectionName)) {
      throw notFound();
    }
    const existing = mockStorage.getPoints(collectionName);
    const newIds = new Set(points.map((p) => p.id));
    const filtered = existing.filter((p) => !newIds.has(p.id));
    mockStorage.points.set(collectionName, [...filtered, ...points]);
    return { status: "completed" };
  });

  delete = vi.fn(async (collectionName: string, { points }: { points: PointId[] }) => {
    const failure = mockStorage.takeFailure("delete");
    if (failure !== undefined) {
      throw failure;
    }
    mockStorage.deleteRequests.push([...points]);
    const idsToDelete = new Set(points);
    mockStorage.points.set(
      collectionName,
      mockStorage.getPoints(collectionName).filter((p) => !idsToDelete.has(p.id)),
    );
    return { status: "completed" };
  });

  scroll = vi.fn(
    async (collectionName: string, { limit, offset }: { limit: number; offset?: PointId }) => {
      if (!mockStorage.collections.has(collectionName)) {
        throw notFound();
      }
      const points = sortedPoints(collectionName);
      const start = offset === undefined ? 0 : points.findIndex((p) => p.id === offset);
      const page = start < 0 ? [] : points.slice(start, start + limit);
      const next = start < 0 ? undefined : points[start + limit];

      return {
        points: page.map((p) => ({ id: p.id, payload: p.payload })),
        next_page_offset: next ? next.id : null,
      };
    },
  );
}
