import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";

export type Distance = "Cosine" | "Euclid" | "Dot";

/** Qdrant point identifier: unsigned integer or UUID */
export type PointId = string | number;

/** Qdrant's default optimizer indexing threshold (KB) */
export const DEFAULT_INDEXING_THRESHOLD = 20000;

/** Payload key holding the source record identifier */
export const RECORD_ID_KEY = "recordId";

export interface CollectionInfo {
  name: string;
  vectorSize: number;
  pointsCount: number;
  distance: Distance;
  indexingThreshold?: number;
}

/**
 * A record rendered as a point, keyed by its store identifier
 */
export interface IndexPoint {
  recordId: string;
  vector: number[];
  payload?: Record<string, unknown>;
}

/**
 * A point read back from the collection while scrolling
 */
export interface ScrolledPoint {
  pointId: PointId;
  recordId: string;
  payload: Record<string, unknown>;
}

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Point id for a record id. Qdrant accepts unsigned integers and UUIDs only,
 * so any other string is hashed to a deterministic UUID-shaped id.
 */
export function toPointId(recordId: string | number): PointId {
  if (typeof recordId === "number") {
    return recordId;
  }

  if (UUID_PATTERN.test(recordId)) {
    return recordId;
  }

  const hash = createHash("sha256").update(recordId).digest("hex");
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-${hash.slice(12, 16)}-${hash.slice(16, 20)}-${hash.slice(20, 32)}`;
}

function describeError(error: unknown): string {
  // REST errors carry the server message in data.status.error
  if (typeof error === "object" && error !== null && "data" in error) {
    const { data } = error;
    if (typeof data === "object" && data !== null && "status" in data) {
      const { status } = data;
      if (typeof status === "object" && status !== null && "error" in status && typeof status.error === "string") {
        return status.error;
      }
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export class QdrantManager {
  private client: QdrantClient;

  constructor(url: string = "http://localhost:6333", apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async collectionExists(name: string): Promise<boolean> {
    const response = await this.client.getCollections();
    return response.collections.some((c) => c.name === name);
  }

  async createCollection(
    name: string,
    vectorSize: number,
    distance: Distance = "Cosine",
  ): Promise<void> {
    await this.client.createCollection(name, {
      vectors: { size: vectorSize, distance },
    });
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo> {
    const info = await this.client.getCollection(name);
    const vectorConfig = info.config.params.vectors;

    let size = 0;
    let distance: Distance = "Cosine";
    if (typeof vectorConfig === "object" && vectorConfig !== null && "size" in vectorConfig) {
      size = typeof vectorConfig.size === "number" ? vectorConfig.size : 0;
      distance = vectorConfig.distance as Distance;
    }

    const threshold = info.config.optimizer_config.indexing_threshold;

    return {
      name,
      vectorSize: size,
      pointsCount: info.points_count || 0,
      distance,
      indexingThreshold: typeof threshold === "number" ? threshold : undefined,
    };
  }

  /**
   * Upsert records as points. The record id is kept in the payload so that
   * scrolled points can be matched back to store rows.
   */
  async upsertRecords(collectionName: string, points: IndexPoint[]): Promise<void> {
    // Guard against empty arrays - Qdrant throws "Empty update request"
    if (points.length === 0) {
      return;
    }

    try {
      await this.client.upsert(collectionName, {
        wait: true,
        points: points.map((point) => ({
          id: toPointId(point.recordId),
          vector: point.vector,
          payload: { ...point.payload, [RECORD_ID_KEY]: point.recordId },
        })),
      });
    } catch (error) {
      throw new Error(
        `Failed to upsert points to collection "${collectionName}": ${describeError(error)}`,
      );
    }
  }

  /**
   * Delete points by their Qdrant ids in a single request
   */
  async deletePoints(collectionName: string, pointIds: PointId[]): Promise<void> {
    if (pointIds.length === 0) {
      return;
    }

    try {
      await this.client.delete(collectionName, {
        wait: true,
        points: pointIds,
      });
    } catch (error) {
      throw new Error(
        `Failed to delete points from collection "${collectionName}": ${describeError(error)}`,
      );
    }
  }

  /**
   * Page through the whole collection, `batchSize` points at a time
   */
  async *scrollBatches(
    collectionName: string,
    batchSize: number,
  ): AsyncGenerator<ScrolledPoint[]> {
    let offset: PointId | undefined;

    do {
      const page = await this.client.scroll(collectionName, {
        limit: batchSize,
        offset,
        with_payload: true,
        with_vector: false,
      });

      if (page.points.length > 0) {
        yield page.points.map((point) => {
          const payload = point.payload ?? {};
          const recordId = payload[RECORD_ID_KEY];
          return {
            pointId: point.id,
            recordId:
              typeof recordId === "string" || typeof recordId === "number"
                ? String(recordId)
                : String(point.id),
            payload,
          };
        });
      }

      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);
  }

  /**
   * Disable background indexing for bulk upload performance.
   * Call enableIndexing() after upload completes.
   */
  async disableIndexing(collectionName: string): Promise<void> {
    await this.client.updateCollection(collectionName, {
      optimizers_config: {
        indexing_threshold: 0,
      },
    });
  }

  /**
   * Re-enable indexing after bulk upload.
   */
  async enableIndexing(
    collectionName: string,
    threshold: number = DEFAULT_INDEXING_THRESHOLD,
  ): Promise<void> {
    await this.client.updateCollection(collectionName, {
      optimizers_config: {
        indexing_threshold: threshold,
      },
    });
  }
}
