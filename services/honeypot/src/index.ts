import { HoneypotConfig } from "./types";
import { getConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { PatternLibrary } from "./patterns";
import { IntelligenceExtractor } from "./extractor";
import { ScamDetector } from "./scam-detector";
import { loadPersonaProfile, PersonaAgent } from "./persona-agent";
import { OpenAiScamAssist, OpenAiTextGenerator } from "./openai-client";
import { CircuitBreaker } from "./circuit-breaker";
import { SessionStore } from "./session-store";
import { FanoutReporter, LogReporter, Reporter } from "./report";
import { CallbackReporter } from "./callback-reporter";
import { ReportStreamEmitter } from "./report-stream";
import { Orchestrator } from "./orchestrator";
import { HoneypotServer } from "./server";

const logger = createLogger("honeypot-service");

export interface HoneypotApp {
  server: HoneypotServer;
  orchestrator: Orchestrator;
  store: SessionStore;
  streamEmitter: ReportStreamEmitter | null;
  breakers: CircuitBreaker[];
}

/**
 * Wire every component from configuration. Nothing is started.
 */
export function createApp(config: HoneypotConfig): HoneypotApp {
  if (!config.api_key) {
    throw new ConfigError("API_KEY is required to start the server");
  }

  const patterns = PatternLibrary.compile();
  const breakers: CircuitBreaker[] = [];

  const openai = config.openai_api_key
    ? {
        apiKey: config.openai_api_key,
        model: config.openai_model,
        baseUrl: config.openai_base_url,
      }
    : null;
  if (!openai) {
    logger.warn("OPENAI_API_KEY not set, replies come from the template set");
  }

  const detector = new ScamDetector(patterns, {
    threshold: config.scam_threshold,
    assistBand: config.assist_band,
    assist: openai ? new OpenAiScamAssist(openai) : null,
    assistTimeoutMs: config.generation_timeout_ms,
  });

  const generationBreaker = new CircuitBreaker({
    name: "generation",
    threshold: config.circuit_breaker_threshold,
    resetTimeout: config.circuit_breaker_reset_ms,
  });
  breakers.push(generationBreaker);

  const agent = new PersonaAgent(
    loadPersonaProfile(),
    openai ? new OpenAiTextGenerator(openai) : null,
    patterns,
    {
      historyWindow: config.history_window,
      generationTimeoutMs: config.generation_timeout_ms,
      scamThreshold: config.scam_threshold,
      highConfidenceThreshold: config.high_confidence_threshold,
      breaker: generationBreaker,
    }
  );

  const sinks: Reporter[] = [new LogReporter()];
  if (config.callback_url) {
    const callbackBreaker = new CircuitBreaker({
      name: "callback",
      threshold: config.circuit_breaker_threshold,
      resetTimeout: config.circuit_breaker_reset_ms,
    });
    breakers.push(callbackBreaker);
    sinks.push(
      new CallbackReporter({
        url: config.callback_url,
        timeoutMs: config.callback_timeout_ms,
        maxAttempts: config.callback_max_attempts,
        breaker: callbackBreaker,
      })
    );
  }
  const streamEmitter = config.redis_host
    ? new ReportStreamEmitter({ host: config.redis_host, port: config.redis_port })
    : null;
  if (streamEmitter) {
    sinks.push(streamEmitter);
  }

  const store = new SessionStore({ inactivityWindowMs: config.inactivity_window_ms });
  const orchestrator = new Orchestrator(
    {
      store,
      patterns,
      extractor: new IntelligenceExtractor(patterns),
      detector,
      agent,
      reporter: new FanoutReporter(sinks),
    },
    { highConfidenceThreshold: config.high_confidence_threshold }
  );

  const server = new HoneypotServer({
    orchestrator,
    store,
    apiKey: config.api_key,
    maxMessageLength: config.max_message_length,
    breakers,
    streamEmitter,
  });

  return { server, orchestrator, store, streamEmitter, breakers };
}

// Main entry point
async function main(): Promise<void> {
  logger.info("Starting scam honeypot service");

  const config = getConfig();
  const app = createApp(config);

  const sweepTimer =
    config.sweep_interval_ms > 0
      ? setInterval(() => app.store.sweepExpired(), config.sweep_interval_ms)
      : null;
  sweepTimer?.unref();

  const shutdown = async (): Promise<void> => {
    logger.info("Received shutdown signal");
    if (sweepTimer) {
      clearInterval(sweepTimer);
    }
    await app.server.shutdown();
    await app.orchestrator.flush();
    await app.streamEmitter?.disconnect();
    logger.info("Honeypot service shutdown complete");
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.fatal({ error: errorMessage(error) }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  process.on("uncaughtException", (error: Error) => {
    logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
    process.exit(1);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logger.fatal({ reason: errorMessage(reason) }, "Unhandled rejection");
    process.exit(1);
  });

  await app.server.start(config.port);
  logger.info("Honeypot service ready");
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, "Failed to start service");
    process.exit(1);
  });
}
