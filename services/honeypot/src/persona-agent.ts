import { z } from "zod";
import personaData from "./data/persona.json";
import { ENTITY_KINDS, EntityKind, Persona, Session, Verdict } from "./types";
import { GenerationRequest, TextGenerator } from "./generation";
import { PatternLibrary } from "./patterns";
import { CircuitBreaker } from "./circuit-breaker";
import { withTimeout } from "./timeout";
import { errorMessage, GenerationFailure } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("persona-agent");

export const REDACTED_NUMBER = "[number withheld]";
export const REDACTED_ID = "[id withheld]";

const LONG_DIGIT_RUN = /\d(?:[\s-]?\d){8,}/g;

const profileSchema = z.object({
  persona: z.object({
    name: z.string().min(1),
    age: z.number().int().positive(),
    background: z.array(z.string()),
    languageStyle: z.string(),
    samplePhrases: z.array(z.string()),
    stallAfterTurns: z.number().int().min(0),
  }),
  fallbackReplies: z
    .record(z.string(), z.array(z.string().min(1)).min(1))
    .refine((replies) => "default" in replies, {
      message: "fallbackReplies needs a default entry",
    })
    .refine(
      (replies) => Object.values(replies).flat().every((reply) => !/\d/.test(reply)),
      { message: "fallback replies must not contain digits" }
    ),
});

export interface PersonaProfile {
  persona: Persona;
  fallbackReplies: Record<string, string[]>;
}

/**
 * Validate and freeze the persona profile. Defaults to the bundled one.
 */
export function loadPersonaProfile(data: unknown = personaData): PersonaProfile {
  const parsed = profileSchema.parse(data);
  return Object.freeze({
    persona: Object.freeze(parsed.persona),
    fallbackReplies: Object.freeze(parsed.fallbackReplies),
  });
}

// Most specific first: the fallback speaks to the strongest pressure tactic
const FALLBACK_PRIORITY = [
  "otp-request",
  "payment-request",
  "lottery",
  "kyc",
  "threat",
  "impersonation",
  "investment",
  "refund",
  "phishing",
  "urgency",
];

const CATEGORY_GUIDANCE: Record<string, string> = {
  lottery:
    "They claim you won a prize. Act excited but puzzled you never bought a ticket; ask how to claim and whether there is any fee.",
  "otp-request":
    "They want a code or password. Act confused about where the code appears; ask why they need it.",
  "payment-request":
    "They want money or bank details. Ask exactly whom to pay and to which account or UPI ID, as if writing it down.",
  impersonation:
    "They pose as a bank or government official. Ask for their name, employee ID, branch and a direct number.",
  kyc:
    "They say your KYC must be updated. Pretend not to know what KYC is and ask which bank they are from.",
  threat:
    "They threaten blocking or legal action. Sound worried and ask what exactly you must do.",
  investment:
    "They promise high returns. Show interest and ask for the company name and documents.",
  refund:
    "They offer a refund or cashback. Ask what it is for and how it will be paid.",
  phishing:
    "They push a link or app. Say it does not open and ask them to resend it or explain what it is.",
  urgency:
    "They are rushing you. Be slow, mention small delays, keep them waiting without refusing.",
};

const ELICIT: Record<EntityKind, string> = {
  phone: "get their phone number (to call back or tell your son)",
  upi: "get their UPI ID (your grandson will send the money)",
  bankAccount: "ask which bank and account number the money should go to",
  url: "ask for the website or link to check",
};

const KIND_LABELS: Record<EntityKind, string> = {
  phone: "phone",
  upi: "UPI",
  bankAccount: "bank account",
  url: "link",
};

export interface PersonaAgentOptions {
  historyWindow?: number;
  generationTimeoutMs?: number;
  scamThreshold?: number;
  highConfidenceThreshold?: number;
  breaker?: CircuitBreaker | null;
}

/**
 * Produces the honeypot's next reply in character.
 *
 * Every reply, generated or fallback, passes the self-leak guard before it
 * leaves the agent.
 */
export class PersonaAgent {
  private readonly historyWindow: number;
  private readonly generationTimeoutMs: number;
  private readonly scamThreshold: number;
  private readonly highConfidenceThreshold: number;
  private readonly breaker: CircuitBreaker | null;
  private readonly systemPersona: string;

  constructor(
    private readonly profile: PersonaProfile,
    private readonly generator: TextGenerator | null,
    private readonly patterns: PatternLibrary,
    options: PersonaAgentOptions = {}
  ) {
    this.historyWindow = options.historyWindow ?? 12;
    this.generationTimeoutMs = options.generationTimeoutMs ?? 8000;
    this.scamThreshold = options.scamThreshold ?? 0.5;
    this.highConfidenceThreshold = options.highConfidenceThreshold ?? 0.8;
    this.breaker = options.breaker ?? null;
    this.systemPersona = buildSystemPersona(profile.persona);
  }

  /**
   * Next reply for the session. Never rejects: generation problems fall back
   * to a template reply.
   */
  async reply(session: Session, verdict: Verdict): Promise<string> {
    const generator = this.generator;
    if (!generator) {
      return this.guard(this.fallbackReply(session, verdict));
    }

    const request = this.buildRequest(session, verdict);
    const generate = (): Promise<string> =>
      withTimeout(
        (signal) => generator.generate(request, signal),
        this.generationTimeoutMs,
        "text generation"
      );

    try {
      const draft = this.breaker
        ? await this.breaker.execute(generate)
        : await generate();
      const guarded = this.guard(draft).trim();
      if (guarded === "") {
        throw new GenerationFailure("Generated reply was empty");
      }
      return guarded;
    } catch (error) {
      logger.warn(
        { session_id: session.id, error: errorMessage(error) },
        "Generation failed, using fallback reply"
      );
      return this.guard(this.fallbackReply(session, verdict));
    }
  }

  buildRequest(session: Session, verdict: Verdict): GenerationRequest {
    return {
      systemPersona: this.systemPersona,
      history: session.turns
        .slice(-this.historyWindow)
        .map((turn) => turn.message),
      instructions: this.buildInstructions(session, verdict),
    };
  }

  buildInstructions(session: Session, verdict: Verdict): string {
    const lines: string[] = [
      "RULES:",
      "- Never reveal real personal or financial data. Never type phone numbers, account numbers, UPI IDs, OTPs or PINs, not even made-up ones.",
      "- Never reveal you are an AI or that you suspect a scam.",
      "- Stall rather than comply: you may promise, but never actually pay or share a code.",
      "- Reply in 1-3 short sentences and ask exactly ONE question.",
      "",
      `ENGAGEMENT: ${this.engagementLevel(verdict.score)}`,
    ];

    const guidance = verdict.categories
      .map((category) => CATEGORY_GUIDANCE[category])
      .filter((text): text is string => text !== undefined);
    if (guidance.length > 0) {
      lines.push("", "SITUATION:", ...guidance.map((text) => `- ${text}`));
    }

    const collected = new Set<EntityKind>(
      [...session.entities.values()].map((entity) => entity.kind)
    );
    const missing = ENTITY_KINDS.filter((kind) => !collected.has(kind));
    if (missing.length > 0) {
      lines.push(
        "",
        `GOAL: Try to ${missing.slice(0, 2).map((kind) => ELICIT[kind]).join("; ")}.`
      );
    } else {
      lines.push("", "GOAL: Keep them talking; ask for any other names, numbers or links they use.");
    }

    if (this.shouldStall(session, verdict)) {
      lines.push(
        "",
        "STALL: They keep pressing for money or codes. Make believable excuses (bank closed, battery low, waiting for your son) and keep asking questions."
      );
    }

    return lines.join("\n");
  }

  /**
   * Self-leak guard: redact anything in a draft that looks like a phone
   * number, UPI handle, account number or a long run of digits.
   */
  guard(draft: string): string {
    const sensitive = this.patterns
      .match(draft)
      .filter((match) => match.form !== "url")
      .sort((a, b) => b.span.start - a.span.start);

    let text = draft;
    for (const match of sensitive) {
      const placeholder = match.form === "upi" ? REDACTED_ID : REDACTED_NUMBER;
      text = text.slice(0, match.span.start) + placeholder + text.slice(match.span.end);
    }
    return text.replace(LONG_DIGIT_RUN, REDACTED_NUMBER);
  }

  /**
   * Static reply keyed by the strongest verdict category.
   * Deterministic: rotates with the number of agent turns so far.
   */
  fallbackReply(session: Session, verdict: Verdict): string {
    const replies = this.profile.fallbackReplies;
    const category =
      FALLBACK_PRIORITY.find(
        (c) => verdict.categories.includes(c) && replies[c] !== undefined
      ) ?? "default";
    const options = replies[category] ?? replies["default"] ?? [];
    const agentTurns = session.turns.filter((t) => t.message.sender === "agent").length;
    return options[agentTurns % Math.max(options.length, 1)] ?? "Haan ji?";
  }

  /**
   * Internal note recorded on the session for reports.
   */
  note(session: Session, verdict: Verdict): string {
    const parts: string[] = [];
    if (verdict.categories.length > 0) {
      parts.push(`Scam type: ${verdict.categories.join(", ")}`);
    }
    parts.push(`Message #${session.turns.length}`);
    parts.push(`Score ${verdict.score.toFixed(2)}`);

    const counts = new Map<EntityKind, number>();
    for (const entity of session.entities.values()) {
      counts.set(entity.kind, (counts.get(entity.kind) ?? 0) + 1);
    }
    if (counts.size > 0) {
      const summary = ENTITY_KINDS.filter((kind) => counts.has(kind)).map(
        (kind) => `${counts.get(kind)} ${KIND_LABELS[kind]}`
      );
      parts.push(`Intel gathered: ${summary.join(", ")}`);
    }
    return parts.join(". ");
  }

  private engagementLevel(score: number): string {
    if (score >= this.highConfidenceThreshold) {
      return "They are clearly running a scam. Be eager and cooperative-sounding so they reveal more payment and contact details.";
    }
    if (score >= this.scamThreshold) {
      return "Likely a scam. Show interest mixed with confusion; ask them to explain each step.";
    }
    if (score >= this.scamThreshold / 2) {
      return "Possibly a scam. Be mildly curious but cautious.";
    }
    return "Unclear intent. Be politely confused and ask who they are and what they want.";
  }

  private shouldStall(session: Session, verdict: Verdict): boolean {
    const pressing = ["payment-request", "otp-request"];
    const asked =
      verdict.categories.some((c) => pressing.includes(c)) ||
      session.verdictTrend.some((v) => v.categories.some((c) => pressing.includes(c)));
    const agentTurns = session.turns.filter((t) => t.message.sender === "agent").length;
    return asked && agentTurns >= this.profile.persona.stallAfterTurns;
  }
}

function buildSystemPersona(persona: Persona): string {
  return [
    `You are ${persona.name}, ${persona.age} years old, chatting on your phone.`,
    "",
    "BACKGROUND:",
    ...persona.background.map((line) => `- ${line}`),
    "",
    `LANGUAGE: ${persona.languageStyle}`,
    "",
    "EXAMPLES OF HOW YOU TALK:",
    ...persona.samplePhrases.map((phrase) => `- "${phrase}"`),
  ].join("\n");
}
