import { IntelligenceReport } from "./types";
import { Reporter } from "./report";
import { CircuitBreaker, CircuitOpenError } from "./circuit-breaker";
import { withTimeout } from "./timeout";
import { CallbackFailure, errorMessage } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("callback-reporter");

export interface CallbackReporterOptions {
  url: string;
  timeoutMs: number;
  breaker?: CircuitBreaker | null;
  maxAttempts?: number; // Delivery attempts per report (default: 3)
  retryDelayMs?: number; // First backoff delay, doubled per retry (default: 1000)
  fetchImpl?: typeof fetch;
}

const MAX_RETRY_DELAY_MS = 10000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * POSTs each report as JSON to the configured callback endpoint, retrying
 * with exponential backoff. Every attempt goes through the breaker; an open
 * circuit ends the retries. Delivery failures are logged, never thrown.
 */
export class CallbackReporter implements Reporter {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker | null;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CallbackReporterOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.breaker = options.breaker ?? null;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async report(report: IntelligenceReport): Promise<void> {
    const started = Date.now();

    try {
      const attempts = await this.deliverWithRetry(report);
      logger.info(
        {
          report_id: report.report_id,
          session_id: report.sessionId,
          reason: report.reason,
          attempts,
          latency_ms: Date.now() - started,
        },
        "Callback delivered"
      );
    } catch (error) {
      const failure =
        error instanceof CallbackFailure
          ? error
          : new CallbackFailure(errorMessage(error), { cause: error });
      logger.error(
        {
          report_id: report.report_id,
          session_id: report.sessionId,
          reason: report.reason,
          error: failure.message,
        },
        "Callback delivery failed"
      );
    }
  }

  /**
   * Resolves with the number of attempts used; rejects with the last error.
   */
  private async deliverWithRetry(report: IntelligenceReport): Promise<number> {
    const deliver = (): Promise<void> => this.send(report);

    for (let attempt = 1; ; attempt++) {
      try {
        await (this.breaker ? this.breaker.execute(deliver) : deliver());
        return attempt;
      } catch (error) {
        if (error instanceof CircuitOpenError || attempt >= this.maxAttempts) {
          throw error;
        }
        const backoff = Math.min(this.retryDelayMs * 2 ** (attempt - 1), MAX_RETRY_DELAY_MS);
        logger.warn(
          {
            report_id: report.report_id,
            attempt,
            retry_in_ms: backoff,
            error: errorMessage(error),
          },
          "Callback attempt failed, retrying"
        );
        await delay(backoff);
      }
    }
  }

  private async send(report: IntelligenceReport): Promise<void> {
    const response = await withTimeout(
      (signal) =>
        this.fetchImpl(this.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(report),
          signal,
        }),
      this.timeoutMs,
      "callback delivery"
    );

    if (!response.ok) {
      throw new CallbackFailure(`Callback endpoint responded ${response.status}`);
    }
  }
}
