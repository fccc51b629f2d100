import Redis from "ioredis";
import { IntelligenceReport } from "./types";
import { Reporter } from "./report";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const logger = createLogger("report-stream");

export const REPORT_STREAM_KEY = "honeypot:reports";

export interface ReportStreamOptions {
  host: string;
  port: number;
  streamKey?: string;
  /** Pre-built client; the emitter takes ownership of it */
  client?: Redis;
}

/**
 * Publishes intelligence reports to a Redis stream for downstream consumers.
 *
 * Fail-open: while Redis is unreachable, reports are logged and dropped
 * here; the callback and log sinks still receive them.
 */
export class ReportStreamEmitter implements Reporter {
  private redis: Redis | null;
  private readonly streamKey: string;

  constructor(options: ReportStreamOptions) {
    this.streamKey = options.streamKey ?? REPORT_STREAM_KEY;
    this.redis =
      options.client ??
      new Redis({
        host: options.host,
        port: options.port,
        retryStrategy: (times: number) => {
          // Exponential backoff: 1s, 2s, 4s, 8s, max 10s
          const delay = Math.min(Math.pow(2, times) * 1000, 10000);
          logger.info({ attempt: times, delay_ms: delay }, "Redis reconnecting");
          return delay;
        },
        maxRetriesPerRequest: 3,
        enableReadyCheck: true,
        enableOfflineQueue: false,
      });
    this.attachListeners(this.redis);
  }

  private attachListeners(redis: Redis): void {
    redis.on("ready", () => {
      logger.info({ stream: this.streamKey }, "Redis ready");
    });
    redis.on("error", (error: Error) => {
      logger.error({ error: error.message }, "Redis connection error");
    });
    redis.on("close", () => {
      logger.warn("Redis connection closed");
    });
  }

  public isConnected(): boolean {
    return this.redis !== null && this.redis.status === "ready";
  }

  /**
   * Append one report to the stream. Never rejects.
   */
  public async report(report: IntelligenceReport): Promise<void> {
    if (!this.isConnected() || !this.redis) {
      logger.warn(
        { report_id: report.report_id, session_id: report.sessionId },
        "Redis not connected, skipping report emit (fail-open)"
      );
      return;
    }

    const fields: Record<string, string> = {
      report_id: report.report_id,
      session_id: report.sessionId,
      reason: report.reason,
      scam_detected: String(report.scamDetected),
      max_score: report.maxScore.toFixed(4),
      payload: JSON.stringify(report),
      reported_at: report.reported_at,
    };

    try {
      const streamId = await this.redis.xadd(
        this.streamKey,
        "*",
        ...Object.entries(fields).flat()
      );
      logger.debug(
        { report_id: report.report_id, stream_id: streamId },
        "Report emitted to stream"
      );
    } catch (error) {
      logger.error(
        { report_id: report.report_id, error: errorMessage(error) },
        "Failed to emit report to Redis stream (fail-open)"
      );
    }
  }

  /**
   * Stream statistics for the metrics endpoint.
   */
  public async getStreamInfo(): Promise<{ length: number; lastId: string | null } | null> {
    if (!this.isConnected() || !this.redis) {
      return null;
    }

    try {
      const length = await this.redis.xlen(this.streamKey);
      const newest = await this.redis.xrevrange(this.streamKey, "+", "-", "COUNT", 1);
      const lastId = newest.length > 0 ? newest[0][0] : null;
      return { length, lastId };
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Failed to get stream info");
      return null;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.redis) {
      return;
    }
    try {
      await this.redis.quit();
      logger.info("Redis disconnected gracefully");
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Error during Redis disconnect");
    }
    this.redis = null;
  }
}
