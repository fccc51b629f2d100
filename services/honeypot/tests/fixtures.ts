import { createSession } from "../src/session-store";
import {
  ConversationTurn,
  Entity,
  entityKey,
  HoneypotRequest,
  IntelligenceReport,
  Message,
  Session,
  Verdict,
} from "../src/types";
import { Reporter } from "../src/report";
import { GenerationRequest, TextGenerator } from "../src/generation";

export const LOTTERY_MESSAGE = "Congratulations! You won 10 lakh lottery. Send bank details.";

export function turn(sender: Message["sender"], text: string): ConversationTurn {
  return {
    message: { sender, text, timestamp: 0 },
    detectedCategories: [],
    extractedEntities: [],
    matchedTerms: [],
  };
}

export function verdict(categories: string[], score = 0.6): Verdict {
  return { isScam: score >= 0.5, score, categories, assisted: false };
}

export function sessionWith(turns: ConversationTurn[], entities: Entity[] = []): Session {
  const session = createSession("session-1", 0);
  session.turns.push(...turns);
  entities.forEach((entity) => session.entities.set(entityKey(entity.kind, entity.value), entity));
  return session;
}

export function request(
  sessionId: string,
  text: string,
  conversationHistory: Message[] = []
): HoneypotRequest {
  return {
    sessionId,
    message: { sender: "scammer", text, timestamp: 0 },
    conversationHistory,
    metadata: {},
  };
}

/**
 * Reporter that records everything it is given.
 */
export class RecordingReporter implements Reporter {
  readonly reports: IntelligenceReport[] = [];

  async report(report: IntelligenceReport): Promise<void> {
    this.reports.push(report);
  }
}

/**
 * Generator returning scripted replies in order; the last one repeats.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly replies: string[]) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.replies[Math.min(this.requests.length - 1, this.replies.length - 1)];
  }
}

/**
 * Generator that never answers and ignores cancellation.
 */
export class HangingGenerator implements TextGenerator {
  calls = 0;

  generate(): Promise<string> {
    this.calls++;
    return new Promise(() => undefined);
  }
}
