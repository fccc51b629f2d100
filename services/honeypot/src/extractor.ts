import { Entity, EntityKind, entityKey } from "./types";
import { EntityMatch, KeywordContext, PatternLibrary } from "./patterns";

/**
 * Confidence assigned per match specificity.
 */
const CONFIDENCE = {
  upiKnownProvider: 0.95,
  upi: 0.9,
  url: 0.85,
  formattedPhone: 0.9,
  accountWithKeyword: 0.85,
  accountNearPayment: 0.7,
  bareAccount: 0.5,
  ambiguousInContext: 0.6,
  ambiguousPhoneAlone: 0.35,
  ambiguousAccountAlone: 0.25,
  spelled: 0.4,
};

export interface ExtractionResult {
  /** Entities mentioned in this message, deduplicated */
  entities: Entity[];
  /** Session entities with this message merged in */
  merged: Map<string, Entity>;
  /** Keys that did not exist in the session before this message */
  added: string[];
}

/**
 * Canonical phone form: Indian mobiles become +91XXXXXXXXXX, other numbers
 * written with a country code keep a leading +.
 */
export function normalizePhone(raw: string): string {
  const digits = raw.replace(/\D/g, "");
  const mobile = /^(?:0091|91|0)?([6-9]\d{9})$/.exec(digits);
  if (mobile) {
    return `+91${mobile[1]}`;
  }
  const trimmed = raw.trim();
  if (trimmed.startsWith("+")) {
    return `+${digits}`;
  }
  if (trimmed.startsWith("00")) {
    return `+${digits.slice(2)}`;
  }
  return digits;
}

/**
 * Lowercase scheme and host, drop a bare trailing slash.
 */
export function normalizeUrl(raw: string): string {
  if (!/^https?:\/\//i.test(raw)) {
    const slash = raw.indexOf("/");
    return slash === -1
      ? raw.toLowerCase()
      : raw.slice(0, slash).toLowerCase() + raw.slice(slash);
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return raw.toLowerCase();
  }

  const path = parsed.pathname === "/" ? "" : parsed.pathname;
  return `${parsed.protocol}//${parsed.host}${path}${parsed.search}${parsed.hash}`;
}

export function normalizeEntityValue(kind: EntityKind, match: EntityMatch): string {
  switch (kind) {
    case "upi":
      return match.raw.toLowerCase();
    case "url":
      return normalizeUrl(match.raw);
    case "phone":
      return match.form === "spelled" || match.form === "bare"
        ? normalizePhone(match.digits ?? match.raw)
        : normalizePhone(match.raw);
    case "bankAccount":
      return (match.digits ?? match.raw).replace(/\D/g, "");
  }
}

/**
 * Applies the pattern library to scammer messages and maintains the
 * session's deduplicated entity set.
 */
export class IntelligenceExtractor {
  constructor(private readonly patterns: PatternLibrary) {}

  /**
   * Extract entities from one message and merge them into a copy of the
   * session entities. Inputs are never mutated.
   */
  extract(
    text: string,
    sessionEntities: ReadonlyMap<string, Entity>,
    turnIndex: number
  ): ExtractionResult {
    const local = new Map<string, { kind: EntityKind; value: string; confidence: number }>();

    for (const match of this.patterns.match(text)) {
      const scored = this.score(text, match);
      if (!scored) {
        continue;
      }
      const value = normalizeEntityValue(scored.kind, match);
      if (value === "") {
        continue;
      }
      const key = entityKey(scored.kind, value);
      const previous = local.get(key);
      if (!previous || previous.confidence < scored.confidence) {
        local.set(key, { kind: scored.kind, value, confidence: scored.confidence });
      }
    }

    const merged = new Map<string, Entity>(sessionEntities);
    const entities: Entity[] = [];
    const added: string[] = [];

    for (const [key, candidate] of local) {
      const existing = merged.get(key);
      let entity: Entity;
      if (existing) {
        entity = {
          ...existing,
          confidence: Math.max(existing.confidence, candidate.confidence),
        };
      } else {
        entity = {
          kind: candidate.kind,
          value: candidate.value,
          firstSeenTurn: turnIndex,
          confidence: candidate.confidence,
        };
        added.push(key);
      }
      merged.set(key, entity);
      entities.push(entity);
    }

    return { entities, merged, added };
  }

  /**
   * Pick the entity kind for a match and score it.
   */
  private score(
    text: string,
    match: EntityMatch
  ): { kind: EntityKind; confidence: number } | null {
    switch (match.form) {
      case "upi": {
        const provider = match.raw.slice(match.raw.indexOf("@") + 1);
        return {
          kind: "upi",
          confidence: this.patterns.isKnownUpiProvider(provider)
            ? CONFIDENCE.upiKnownProvider
            : CONFIDENCE.upi,
        };
      }
      case "url":
        return { kind: "url", confidence: CONFIDENCE.url };
      case "international":
      case "grouped":
        return { kind: "phone", confidence: CONFIDENCE.formattedPhone };
      case "bare":
      case "spelled": {
        const context = this.patterns.contextAround(text, match.span);
        const scored = this.scoreNumeric(match.candidates, context);
        if (scored && match.form === "spelled") {
          scored.confidence = Math.min(scored.confidence, CONFIDENCE.spelled);
        }
        return scored;
      }
    }
  }

  private scoreNumeric(
    candidates: readonly EntityKind[],
    context: KeywordContext
  ): { kind: EntityKind; confidence: number } | null {
    if (candidates.length === 1 && candidates[0] === "bankAccount") {
      let confidence = CONFIDENCE.bareAccount;
      if (context.account) {
        confidence = CONFIDENCE.accountWithKeyword;
      } else if (context.payment) {
        confidence = CONFIDENCE.accountNearPayment;
      }
      return { kind: "bankAccount", confidence };
    }

    if (candidates.includes("phone") && candidates.includes("bankAccount")) {
      // Account keywords win: "account number 98..." names an account
      const kind: EntityKind = context.account ? "bankAccount" : "phone";
      const inContext = context.account || context.contact || context.payment;
      if (inContext) {
        return { kind, confidence: CONFIDENCE.ambiguousInContext };
      }
      return {
        kind,
        confidence:
          kind === "phone"
            ? CONFIDENCE.ambiguousPhoneAlone
            : CONFIDENCE.ambiguousAccountAlone,
      };
    }

    return null;
  }
}
