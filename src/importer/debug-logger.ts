/**
 * Debug Logger for Sync Operations
 *
 * Writes trace logs to ~/.search-sync/logs/ (or SYNC_LOG_DIR) when DEBUG=1
 * Helps diagnose:
 * - Unit submission and completion
 * - Executor saturation and backpressure retries
 * - Per-stage timing of import and clean-up passes
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const DEFAULT_LOG_DIR = join(homedir(), ".search-sync", "logs");
const DEBUG = process.env.DEBUG === "true" || process.env.DEBUG === "1";

export type SyncStage = "scroll" | "lookup" | "write" | "delete";

const STAGES: SyncStage[] = ["scroll", "lookup", "write", "delete"];

export interface LogContext {
  component: string;
  operation?: string;
  unitId?: number;
}

export interface StageSummary {
  totalMs: number;
  count: number;
  percentage: number;
}

/**
 * Per-stage timing of one operation
 */
export class StageProfiler {
  private stages: Map<SyncStage, { totalMs: number; count: number }> = new Map();

  addTime(stage: SyncStage, durationMs: number): void {
    const data = this.stages.get(stage) ?? { totalMs: 0, count: 0 };
    data.totalMs += durationMs;
    data.count++;
    this.stages.set(stage, data);
  }

  getSummary(): Partial<Record<SyncStage, StageSummary>> {
    const totalMs = this.getTotalMs();
    const result: Partial<Record<SyncStage, StageSummary>> = {};

    for (const stage of STAGES) {
      const data = this.stages.get(stage);
      if (data && data.count > 0) {
        result[stage] = {
          totalMs: data.totalMs,
          count: data.count,
          percentage: totalMs > 0 ? (data.totalMs / totalMs) * 100 : 0,
        };
      }
    }

    return result;
  }

  getTotalMs(): number {
    return Array.from(this.stages.values()).reduce((sum, d) => sum + d.totalMs, 0);
  }
}

/**
 * Format milliseconds as human-readable duration (e.g., "2m 30s", "45.5s", "150ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds % 60);
  return `${minutes}m ${seconds.toString().padStart(2, "0")}s`;
}

export interface SyncCounters {
  submitted: number;
  completed: number;
  failed: number;
  backpressureRetries: number;
}

export interface SyncLoggerOptions {
  enabled: boolean;
  logDir?: string;
}

export class SyncLogger {
  private readonly enabled: boolean;
  private readonly logDir: string;
  private logFile: string | null = null;
  private writeFailed = false;
  private sessionStart: number;
  private counters: SyncCounters = {
    submitted: 0,
    completed: 0,
    failed: 0,
    backpressureRetries: 0,
  };

  constructor(options: SyncLoggerOptions) {
    this.enabled = options.enabled;
    this.logDir = options.logDir ?? DEFAULT_LOG_DIR;
    this.sessionStart = Date.now();

    if (this.enabled) {
      this.initLogFile();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private initLogFile(): void {
    try {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      this.logFile = join(this.logDir, `sync-${timestamp}.log`);

      const env = (key: string, fallback: string) =>
        process.env[key] != null ? process.env[key] : `${fallback} (default)`;

      this.writeRaw(`
================================================================================
SYNC DEBUG LOG - Session started at ${new Date().toISOString()}
================================================================================
ENV:
  QDRANT_URL                = ${env("QDRANT_URL", "http://localhost:6333")}
  SQLITE_PATH               = ${env("SQLITE_PATH", "./data.db")}
  SYNC_BATCH_SIZE           = ${env("SYNC_BATCH_SIZE", "500")}
  SYNC_CONCURRENCY          = ${env("SYNC_CONCURRENCY", "4")}
  SYNC_MAX_QUEUE_SIZE       = ${env("SYNC_MAX_QUEUE_SIZE", "SYNC_CONCURRENCY x 2")}
  SYNC_BACKOFF_MS           = ${env("SYNC_BACKOFF_MS", "100")}
  SYNC_BACKOFF_MAX_ATTEMPTS = ${env("SYNC_BACKOFF_MAX_ATTEMPTS", "unbounded")}
================================================================================
`);
    } catch (error) {
      this.logFile = null;
      console.error("[SyncLogger] Failed to init log file:", error);
    }
  }

  private writeRaw(message: string): void {
    if (!this.logFile) {
      return;
    }
    try {
      appendFileSync(this.logFile, message + "\n");
    } catch (error) {
      // Report once, then keep logging to stderr only
      if (!this.writeFailed) {
        this.writeFailed = true;
        console.error(`[SyncLogger] Failed to write ${this.logFile}:`, error);
      }
    }
  }

  private formatTime(): string {
    const elapsed = Date.now() - this.sessionStart;
    const sec = Math.floor(elapsed / 1000);
    const ms = elapsed % 1000;
    return `+${sec.toString().padStart(4, " ")}.${ms.toString().padStart(3, "0")}s`;
  }

  /**
   * Log a sync step with timing
   */
  step(ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;

    const prefix = `[${this.formatTime()}] [${ctx.component}]`;
    const suffix = data ? ` | ${JSON.stringify(data)}` : "";

    const line = `${prefix} ${message}${suffix}`;
    this.writeRaw(line);
    console.error(line);
  }

  unitSubmitted(ctx: LogContext, unitId: number, attempt: number): void {
    this.counters.submitted++;
    this.step(ctx, `UNIT_SUBMITTED: unit-${unitId}`, {
      attempt,
      totalSubmitted: this.counters.submitted,
    });
  }

  unitComplete(ctx: LogContext, unitId: number, durationMs: number): void {
    this.counters.completed++;
    this.step(ctx, `UNIT_COMPLETE: unit-${unitId}`, {
      durationMs,
      totalCompleted: this.counters.completed,
    });
  }

  unitFailed(ctx: LogContext, unitId: number, error: string): void {
    this.counters.failed++;
    this.step(ctx, `UNIT_FAILED: unit-${unitId}`, {
      error,
      totalFailed: this.counters.failed,
    });
  }

  /**
   * Log a rejected submission that will be retried
   */
  backpressure(ctx: LogContext, attempt: number, delayMs: number): void {
    this.counters.backpressureRetries++;
    this.step(ctx, "BACKPRESSURE_RETRY", {
      attempt,
      delayMs,
      totalRetries: this.counters.backpressureRetries,
    });
  }

  phase(ctx: LogContext, phase: string, data?: Record<string, unknown>): void {
    this.step(ctx, `PHASE: ${phase}`, data);
  }

  getCounters(): SyncCounters {
    return { ...this.counters };
  }

  /**
   * Log operation summary, with the operation's stage timings when given
   */
  summary(ctx: LogContext, stats: Record<string, unknown>, profiler?: StageProfiler): void {
    if (!this.enabled) return;

    let stageBlock = "";
    if (profiler && profiler.getTotalMs() > 0) {
      const stageSummary = profiler.getSummary();
      stageBlock = "\nSTAGE PROFILING:\n";
      for (const stage of STAGES) {
        const data = stageSummary[stage];
        if (data) {
          stageBlock += `  ${stage.padEnd(7)}  ${formatDuration(data.totalMs).padStart(10)}  ${(data.percentage.toFixed(1) + "%").padStart(6)}  ${data.count.toString().padStart(6)}\n`;
        }
      }
    }

    this.writeRaw(`
--------------------------------------------------------------------------------
SUMMARY for ${ctx.component}${ctx.operation ? ` (${ctx.operation})` : ""}
--------------------------------------------------------------------------------
${JSON.stringify(stats, null, 2)}
Session counters: ${JSON.stringify(this.counters)}${stageBlock}
--------------------------------------------------------------------------------
`);
  }

  getLogPath(): string | null {
    return this.logFile;
  }
}

// Singleton instance
export const syncLog = new SyncLogger({
  enabled: DEBUG,
  logDir: process.env.SYNC_LOG_DIR || undefined,
});
