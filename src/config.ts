/**
 * Environment configuration for sync runs
 */

import { z } from "zod";

const optionalInt = (min: number, max: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional(),
  );

export const SyncEnvSchema = z.object({
  QDRANT_URL: z.string().url().default("http://localhost:6333"),
  QDRANT_API_KEY: z.string().optional(),
  SQLITE_PATH: z.string().min(1).default("./data.db"),
  SYNC_BATCH_SIZE: optionalInt(1, 10_000),
  SYNC_CONCURRENCY: optionalInt(1, 64),
  SYNC_MAX_QUEUE_SIZE: optionalInt(0, 10_000),
  SYNC_BACKOFF_MS: optionalInt(0, 60_000),
  SYNC_BACKOFF_MAX_ATTEMPTS: optionalInt(1, 1_000_000),
});

export interface SyncConfig {
  qdrantUrl: string;
  qdrantApiKey?: string;
  sqlitePath: string;
  batchSize: number;
  workerPool: {
    concurrency: number;
    maxQueueSize: number;
  };
  backoff: {
    intervalMs: number;
    /** Unbounded when undefined */
    maxAttempts?: number;
  };
}

export const DEFAULT_CONFIG: SyncConfig = {
  qdrantUrl: "http://localhost:6333",
  sqlitePath: "./data.db",
  batchSize: 500,
  workerPool: {
    concurrency: 4,
    // Queue size based on concurrency
    maxQueueSize: 8,
  },
  backoff: {
    intervalMs: 100,
  },
};

/**
 * Read sync settings from the environment
 * @throws Error naming every invalid variable
 */
export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = SyncEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid sync configuration: ${problems}`);
  }

  const vars = parsed.data;
  const concurrency = vars.SYNC_CONCURRENCY ?? DEFAULT_CONFIG.workerPool.concurrency;

  return {
    qdrantUrl: vars.QDRANT_URL,
    qdrantApiKey: vars.QDRANT_API_KEY || undefined,
    sqlitePath: vars.SQLITE_PATH,
    batchSize: vars.SYNC_BATCH_SIZE ?? DEFAULT_CONFIG.batchSize,
    workerPool: {
      concurrency,
      maxQueueSize: vars.SYNC_MAX_QUEUE_SIZE ?? concurrency * 2,
    },
    backoff: {
      intervalMs: vars.SYNC_BACKOFF_MS ?? DEFAULT_CONFIG.backoff.intervalMs,
      maxAttempts: vars.SYNC_BACKOFF_MAX_ATTEMPTS,
    },
  };
}
