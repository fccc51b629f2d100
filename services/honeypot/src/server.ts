import http from "http";
import { WebSocketServer, WebSocket, RawData } from "ws";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { Orchestrator } from "./orchestrator";
import { SessionStore } from "./session-store";
import { CircuitBreaker } from "./circuit-breaker";
import { ReportStreamEmitter } from "./report-stream";
import { parseHoneypotRequest } from "./request-schema";
import { errorMessage, ValidationError } from "./errors";
import { HoneypotResponse } from "./types";
import { createLogger } from "./logger";

const logger = createLogger("honeypot-server");

const MAX_BODY_BYTES = 1024 * 1024;

/**
 * WebSocket request frame.
 */
const engageFrameSchema = z.object({
  type: z.literal("engage"),
  request_id: z.string().min(1).optional(),
  payload: z.unknown(),
});

interface EngageResultFrame {
  type: "engage_result";
  request_id: string;
  reply: string;
  processing_ms: number;
}

interface ErrorFrame {
  type: "error";
  request_id?: string;
  error: string;
  message: string;
}

export type ResponseFrame = EngageResultFrame | ErrorFrame;

export interface HttpResult {
  status: number;
  body: HoneypotResponse;
}

export interface HoneypotServerDeps {
  orchestrator: Orchestrator;
  store: SessionStore;
  apiKey: string;
  maxMessageLength: number;
  breakers?: CircuitBreaker[];
  streamEmitter?: ReportStreamEmitter | null;
}

class PayloadTooLargeError extends Error {}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        // Drain the rest so the 413 can still be written on this socket
        req.removeAllListeners("data");
        req.resume();
        reject(new PayloadTooLargeError(`Body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * HTTP and WebSocket front door for the honeypot.
 *
 * POST / engages with one scammer message, GET /health and GET /metrics
 * report on the process, and /ws carries the same exchange as frames.
 */
export class HoneypotServer {
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly deps: HoneypotServerDeps;

  constructor(deps: HoneypotServerDeps) {
    this.deps = deps;
  }

  public isAuthorized(header: string | string[] | undefined): boolean {
    const key = Array.isArray(header) ? header[0] : header;
    return key !== undefined && key === this.deps.apiKey;
  }

  /**
   * Handle a POST / body. Only bad credentials and malformed requests
   * produce an error status; everything else is a success with a reply.
   */
  public async handleEngage(
    apiKeyHeader: string | string[] | undefined,
    rawBody: string
  ): Promise<HttpResult> {
    if (!this.isAuthorized(apiKeyHeader)) {
      return { status: 401, body: { status: "error", message: "Invalid API key" } };
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      return {
        status: 400,
        body: { status: "error", message: `Malformed JSON: ${errorMessage(error)}` },
      };
    }

    try {
      const request = parseHoneypotRequest(body, {
        maxMessageLength: this.deps.maxMessageLength,
      });
      const result = await this.deps.orchestrator.handle(request);
      return { status: 200, body: { status: "success", reply: result.reply } };
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn({ issues: error.issues }, "Rejected malformed request");
        return { status: 400, body: { status: "error", message: error.message } };
      }
      throw error;
    }
  }

  /**
   * Handle one WebSocket frame. Always resolves to a frame to send back.
   */
  public async handleFrame(raw: string): Promise<ResponseFrame> {
    const startTime = Date.now();
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return this.errorFrame("invalid_json", errorMessage(error));
    }

    const frame = engageFrameSchema.safeParse(json);
    if (!frame.success) {
      return this.errorFrame("invalid_request", "Expected an engage frame with a payload");
    }
    const requestId = frame.data.request_id ?? uuidv4();

    try {
      const request = parseHoneypotRequest(frame.data.payload, {
        maxMessageLength: this.deps.maxMessageLength,
      });
      const result = await this.deps.orchestrator.handle(request);
      return {
        type: "engage_result",
        request_id: requestId,
        reply: result.reply,
        processing_ms: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof ValidationError) {
        return this.errorFrame(error.code, error.message, requestId);
      }
      logger.error({ request_id: requestId, error: errorMessage(error) }, "Error processing frame");
      return this.errorFrame("processing_error", "Internal server error", requestId);
    }
  }

  public healthBody(): { status: "ok"; sessions: { active: number; archived: number } } {
    return { status: "ok", sessions: this.deps.store.stats() };
  }

  public async metricsBody(): Promise<Record<string, unknown>> {
    const emitter = this.deps.streamEmitter ?? null;
    const streamInfo = emitter ? await emitter.getStreamInfo() : null;

    return {
      sessions: this.deps.store.stats(),
      circuit_breakers: (this.deps.breakers ?? []).map((breaker) => breaker.snapshot()),
      redis: {
        enabled: emitter !== null,
        connected: emitter ? emitter.isConnected() : false,
        stream_length: streamInfo?.length ?? 0,
        stream_last_id: streamInfo?.lastId ?? null,
      },
      websocket: {
        active_connections: this.wss?.clients.size ?? 0,
      },
    };
  }

  /**
   * Bound port once listening, null before start or after shutdown.
   */
  public listeningPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  /**
   * Start listening. Resolves once the port is bound.
   */
  public start(port: number): Promise<void> {
    const httpServer = http.createServer((req, res) => {
      this.route(req, res).catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Request handling failed");
        if (!res.headersSent) {
          sendJson(res, 500, { status: "error", message: "Internal server error" });
        }
      });
    });

    const wss = new WebSocketServer({
      server: httpServer,
      path: "/ws",
      verifyClient: (info: { req: http.IncomingMessage }) =>
        this.isAuthorized(info.req.headers["x-api-key"]),
    });
    wss.on("connection", (ws: WebSocket) => this.onConnection(ws));
    wss.on("error", (error: Error) => {
      logger.error({ error: error.message }, "WebSocket server error");
    });

    this.httpServer = httpServer;
    this.wss = wss;

    return new Promise((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(port, () => {
        httpServer.off("error", reject);
        logger.info({ port }, "Honeypot server listening");
        resolve();
      });
    });
  }

  private async route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (path === "/" && req.method === "POST") {
      let rawBody: string;
      try {
        rawBody = await readBody(req, MAX_BODY_BYTES);
      } catch (error) {
        if (error instanceof PayloadTooLargeError) {
          sendJson(res, 413, { status: "error", message: error.message });
          return;
        }
        throw error;
      }
      const result = await this.handleEngage(req.headers["x-api-key"], rawBody);
      sendJson(res, result.status, result.body);
    } else if (path === "/health" && req.method === "GET") {
      sendJson(res, 200, this.healthBody());
    } else if (path === "/metrics" && req.method === "GET") {
      sendJson(res, 200, await this.metricsBody());
    } else {
      sendJson(res, 404, { status: "error", message: "Not found" });
    }
  }

  private onConnection(ws: WebSocket): void {
    logger.info("Client connected");

    ws.on("message", (data: RawData) => {
      this.handleFrame(data.toString())
        .then((frame) => ws.send(JSON.stringify(frame)))
        .catch((error: unknown) => {
          logger.error({ error: errorMessage(error) }, "Failed to send frame");
        });
    });

    ws.on("close", () => {
      logger.info("Client disconnected");
    });

    ws.on("error", (error: Error) => {
      logger.error({ error: error.message }, "WebSocket error");
    });
  }

  private errorFrame(error: string, message: string, requestId?: string): ErrorFrame {
    return { type: "error", request_id: requestId, error, message };
  }

  /**
   * Stop accepting connections and close open sockets.
   */
  public async shutdown(): Promise<void> {
    logger.info("Shutting down honeypot server");

    if (this.wss) {
      this.wss.clients.forEach((client) => client.terminate());
      this.wss.close();
      this.wss = null;
    }

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
  }
}
