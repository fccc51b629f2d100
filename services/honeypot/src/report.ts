import { v4 as uuidv4 } from "uuid";
import {
  Entity,
  ExtractedIntelligence,
  IntelligenceReport,
  ReportReason,
  Session,
} from "./types";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const logger = createLogger("report");

/**
 * Outbound intelligence sink. Implementations log their own delivery
 * failures; callers treat report() as fire-and-forget.
 */
export interface Reporter {
  report(report: IntelligenceReport): Promise<void>;
}

function entityOrder(a: Entity, b: Entity): number {
  return a.firstSeenTurn - b.firstSeenTurn || a.kind.localeCompare(b.kind);
}

export function collectIntelligence(session: Session): ExtractedIntelligence {
  const entities = [...session.entities.values()].sort(entityOrder);
  const valuesOf = (kind: Entity["kind"]): string[] =>
    entities.filter((e) => e.kind === kind).map((e) => e.value);

  const keywords = new Set<string>();
  for (const turn of session.turns) {
    turn.matchedTerms.forEach((term) => keywords.add(term));
  }

  return {
    bankAccounts: valuesOf("bankAccount"),
    upiIds: valuesOf("upi"),
    phishingLinks: valuesOf("url"),
    phoneNumbers: valuesOf("phone"),
    suspiciousKeywords: [...keywords],
  };
}

/**
 * Snapshot a session into a report. The session is not modified.
 */
export function buildReport(
  session: Session,
  reason: ReportReason,
  now: number = Date.now()
): IntelligenceReport {
  const categories = new Set<string>();
  let maxScore = 0;
  for (const verdict of session.verdictTrend) {
    verdict.categories.forEach((c) => categories.add(c));
    maxScore = Math.max(maxScore, verdict.score);
  }

  const intelligence = collectIntelligence(session);
  const summary: string[] = [];
  if (categories.size > 0) {
    summary.push(`Scam categories: ${[...categories].sort().join(", ")}`);
  }
  summary.push(`Max score: ${Math.round(maxScore * 100)}%`);
  summary.push(`Total messages: ${session.turns.length}`);
  if (session.channel) {
    summary.push(`Channel: ${session.channel}`);
  }
  const gathered = [
    [intelligence.upiIds.length, "UPI IDs"],
    [intelligence.phoneNumbers.length, "phone numbers"],
    [intelligence.bankAccounts.length, "bank accounts"],
    [intelligence.phishingLinks.length, "links"],
  ] as const;
  const gatheredText = gathered
    .filter(([count]) => count > 0)
    .map(([count, label]) => `${count} ${label}`);
  if (gatheredText.length > 0) {
    summary.push(`Intelligence gathered: ${gatheredText.join(", ")}`);
  }
  const lastNote = session.agentNotes[session.agentNotes.length - 1];
  if (lastNote) {
    summary.push(`Last agent note: ${lastNote}`);
  }

  return {
    report_id: uuidv4(),
    sessionId: session.id,
    reason,
    scamDetected: session.verdictTrend.some((v) => v.isScam),
    maxScore,
    categories: [...categories].sort(),
    totalMessagesExchanged: session.turns.length,
    entities: [...session.entities.values()].sort(entityOrder),
    verdictTrend: session.verdictTrend.map((v) => ({ ...v, categories: [...v.categories] })),
    extractedIntelligence: intelligence,
    agentNotes: summary.join(". "),
    reported_at: new Date(now).toISOString(),
  };
}

/**
 * Always-on sink: writes the report to the structured log.
 */
export class LogReporter implements Reporter {
  async report(report: IntelligenceReport): Promise<void> {
    logger.info(
      {
        report_id: report.report_id,
        session_id: report.sessionId,
        reason: report.reason,
        scam_detected: report.scamDetected,
        max_score: report.maxScore,
        intelligence: report.extractedIntelligence,
      },
      "Intelligence report"
    );
  }
}

/**
 * Delivers each report to every sink; one sink failing does not stop the
 * others.
 */
export class FanoutReporter implements Reporter {
  constructor(private readonly sinks: Reporter[]) {}

  async report(report: IntelligenceReport): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map((sink) => sink.report(report))
    );
    results.forEach((result) => {
      if (result.status === "rejected") {
        logger.error(
          {
            report_id: report.report_id,
            session_id: report.sessionId,
            error: errorMessage(result.reason),
          },
          "Report sink failed"
        );
      }
    });
  }
}
