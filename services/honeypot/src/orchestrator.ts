import {
  ConversationTurn,
  Entity,
  entityKey,
  HandleResult,
  HoneypotRequest,
  IntelligenceReport,
  Message,
  ReportReason,
  RequestMetadata,
  Session,
  Verdict,
} from "./types";
import { cloneSession, createSession, SessionStore } from "./session-store";
import { IntelligenceExtractor } from "./extractor";
import { ScamDetector } from "./scam-detector";
import { PersonaAgent } from "./persona-agent";
import { PatternLibrary } from "./patterns";
import { buildReport, Reporter } from "./report";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("orchestrator");

const PAYMENT_KINDS: ReadonlySet<Entity["kind"]> = new Set(["upi", "bankAccount"]);

export interface OrchestratorDeps {
  store: SessionStore;
  patterns: PatternLibrary;
  extractor: IntelligenceExtractor;
  detector: ScamDetector;
  agent: PersonaAgent;
  reporter: Reporter;
}

export interface OrchestratorOptions {
  highConfidenceThreshold?: number;
  /** Turns required before an engagement can be declared complete */
  minTurnsBeforeEnd?: number;
  /** Past this many turns the engagement is complete regardless */
  maxTurns?: number;
  now?: () => number;
}

/**
 * Runs one inbound scammer message through the pipeline:
 * extract, detect, reply, commit, then report.
 */
export class Orchestrator {
  private readonly store: SessionStore;
  private readonly patterns: PatternLibrary;
  private readonly extractor: IntelligenceExtractor;
  private readonly detector: ScamDetector;
  private readonly agent: PersonaAgent;
  private readonly reporter: Reporter;
  private readonly highConfidenceThreshold: number;
  private readonly minTurnsBeforeEnd: number;
  private readonly maxTurns: number;
  private readonly now: () => number;
  private readonly pending = new Set<Promise<void>>();

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.store = deps.store;
    this.patterns = deps.patterns;
    this.extractor = deps.extractor;
    this.detector = deps.detector;
    this.agent = deps.agent;
    this.reporter = deps.reporter;
    this.highConfidenceThreshold = options.highConfidenceThreshold ?? 0.8;
    this.minTurnsBeforeEnd = options.minTurnsBeforeEnd ?? 10;
    this.maxTurns = options.maxTurns ?? 25;
    this.now = options.now ?? Date.now;

    this.store.onExpire((session) => this.onSessionExpired(session));
  }

  /**
   * Handle one validated request. Never rejects: an internal failure still
   * yields an in-character reply, and the stored session is left as it was.
   */
  async handle(request: HoneypotRequest): Promise<HandleResult> {
    const started = this.now();
    try {
      const result = await this.store.runExclusive(request.sessionId, () =>
        this.process(request)
      );
      logger.info(
        {
          session_id: request.sessionId,
          processing_ms: this.now() - started,
        },
        "Message handled"
      );
      return result;
    } catch (error) {
      logger.error(
        { session_id: request.sessionId, error: errorMessage(error) },
        "Pipeline failed, replying with fallback"
      );
      const blank = createSession(request.sessionId, this.now());
      const neutral: Verdict = { isScam: false, score: 0, categories: [], assisted: false };
      return {
        sessionId: request.sessionId,
        reply: this.agent.guard(this.agent.fallbackReply(blank, neutral)),
      };
    }
  }

  /**
   * Wait for in-flight reports. Used at shutdown and in tests.
   */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async process(request: HoneypotRequest): Promise<HandleResult> {
    const stored = await this.store.getOrCreate(request.sessionId);
    const session = cloneSession(stored);

    if (session.turns.length === 0 && request.conversationHistory.length > 0) {
      this.bootstrap(session, request.conversationHistory);
    }
    applyMetadata(session, request.metadata);

    const message = request.message;
    const turnIndex = session.turns.length;
    const history = session.turns.slice();

    logger.debug(
      { session_id: session.id, turn: turnIndex, preview: message.text.slice(0, 50) },
      "Processing scammer message"
    );

    const extraction = this.extractor.extract(message.text, session.entities, turnIndex);
    const added = new Set(extraction.added);
    const newEntities = extraction.entities.filter((e) =>
      added.has(entityKey(e.kind, e.value))
    );
    const verdict = await this.detector.detectWithAssist(message.text, history, newEntities);

    session.turns.push(this.annotate(message, verdict.categories, extraction.entities));
    session.entities = extraction.merged;
    session.verdictTrend.push(verdict);

    const reply = await this.agent.reply(session, verdict);
    session.agentNotes.push(this.agent.note(session, verdict));
    session.turns.push({
      message: { sender: "agent", text: reply, timestamp: this.now() },
      detectedCategories: [],
      extractedEntities: [],
      matchedTerms: [],
    });

    const due = this.dueReasons(session, verdict, message.text);
    due.forEach((reason) => session.reportedThresholds.add(reason));

    await this.store.commit(session);

    logger.info(
      {
        session_id: session.id,
        is_scam: verdict.isScam,
        score: verdict.score,
        categories: verdict.categories,
        assisted: verdict.assisted,
        new_entities: newEntities.length,
        total_entities: session.entities.size,
      },
      "Turn processed"
    );

    due.forEach((reason) => this.dispatch(buildReport(session, reason, this.now())));
    return { sessionId: session.id, reply };
  }

  /**
   * Seed a brand-new session from caller-supplied history. Scammer turns
   * are annotated as they are ingested; no verdicts are recorded.
   */
  private bootstrap(session: Session, history: readonly Message[]): void {
    for (const message of history) {
      const turnIndex = session.turns.length;
      if (message.sender !== "scammer") {
        session.turns.push({
          message,
          detectedCategories: [],
          extractedEntities: [],
          matchedTerms: [],
        });
        continue;
      }
      const extraction = this.extractor.extract(message.text, session.entities, turnIndex);
      session.entities = extraction.merged;
      const categories = [...this.patterns.scoreIndicators(message.text).keys()].sort();
      session.turns.push(this.annotate(message, categories, extraction.entities));
    }

    logger.info(
      { session_id: session.id, turns: session.turns.length, entities: session.entities.size },
      "Session bootstrapped from caller history"
    );
  }

  private annotate(
    message: Message,
    categories: string[],
    entities: Entity[]
  ): ConversationTurn {
    const terms = new Set(this.patterns.findIndicators(message.text).map((hit) => hit.term));
    return {
      message,
      detectedCategories: categories,
      extractedEntities: entities,
      matchedTerms: [...terms],
    };
  }

  private dueReasons(session: Session, verdict: Verdict, text: string): ReportReason[] {
    const due: ReportReason[] = [];
    const unreported = (reason: ReportReason): boolean =>
      !session.reportedThresholds.has(reason);

    if (
      unreported("payment_identifier") &&
      [...session.entities.values()].some((e) => PAYMENT_KINDS.has(e.kind))
    ) {
      due.push("payment_identifier");
    }
    if (unreported("high_confidence") && verdict.score >= this.highConfidenceThreshold) {
      due.push("high_confidence");
    }
    if (unreported("engagement_complete") && this.engagementComplete(session, text)) {
      due.push("engagement_complete");
    }
    return due;
  }

  private engagementComplete(session: Session, text: string): boolean {
    const turns = session.turns.length;
    if (turns < this.minTurnsBeforeEnd || !session.verdictTrend.some((v) => v.isScam)) {
      return false;
    }
    const kinds = new Set([...session.entities.values()].map((e) => e.kind));
    return kinds.size >= 2 || this.patterns.containsEndPhrase(text) || turns > this.maxTurns;
  }

  private onSessionExpired(session: Session): void {
    const scam = session.verdictTrend.some((v) => v.isScam);
    if (
      !scam ||
      session.reportedThresholds.has("engagement_complete") ||
      session.reportedThresholds.has("session_expired")
    ) {
      return;
    }
    session.reportedThresholds.add("session_expired");
    this.dispatch(buildReport(session, "session_expired", this.now()));
  }

  /**
   * Fire and forget; tracked only so flush() can wait for it.
   */
  private dispatch(report: IntelligenceReport): void {
    const delivery: Promise<void> = this.reporter
      .report(report)
      .catch((error: unknown) => {
        logger.error(
          { report_id: report.report_id, session_id: report.sessionId, error: errorMessage(error) },
          "Unhandled error in report delivery"
        );
      })
      .then(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }
}

function applyMetadata(session: Session, metadata: RequestMetadata): void {
  if (metadata.channel) {
    session.channel = metadata.channel;
  }
  if (metadata.language) {
    session.language = metadata.language;
  }
  if (metadata.locale) {
    session.locale = metadata.locale;
  }
}
