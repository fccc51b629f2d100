import { ConversationTurn, Entity, Verdict } from "./types";
import { PatternLibrary } from "./patterns";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";
import { withTimeout } from "./timeout";

const logger = createLogger("scam-detector");

/**
 * Weight configuration for scoring.
 * Each category's strength is multiplied by its weight and summed.
 */
export const CATEGORY_WEIGHTS: Readonly<Record<string, number>> = {
  lottery: 0.5,
  "otp-request": 0.6,
  "payment-request": 0.4,
  impersonation: 0.35,
  kyc: 0.4,
  threat: 0.35,
  investment: 0.4,
  refund: 0.35,
  phishing: 0.35,
  urgency: 0.25,
};

const DEFAULT_WEIGHT = 0.2;
const PAYMENT_ENTITY_BOOST = 0.15;
const URGENCY_BOOST = 0.1;
const HISTORY_BOOST_PER_CATEGORY = 0.05;
const HISTORY_BOOST_CAP = 0.15;

/**
 * Secondary opinion from an external model, consulted only for scores near
 * the threshold.
 */
export interface ScamAssist {
  assess(
    text: string,
    history: readonly ConversationTurn[],
    signal: AbortSignal
  ): Promise<{ isScam: boolean; confidence: number }>;
}

export interface ScamDetectorOptions {
  threshold?: number;
  assistBand?: number;
  assist?: ScamAssist | null;
  assistTimeoutMs?: number;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Explainable rule scorer over indicator categories.
 */
export class ScamDetector {
  private readonly threshold: number;
  private readonly assistBand: number;
  private readonly assist: ScamAssist | null;
  private readonly assistTimeoutMs: number;

  constructor(
    private readonly patterns: PatternLibrary,
    options: ScamDetectorOptions = {}
  ) {
    this.threshold = options.threshold ?? 0.5;
    this.assistBand = options.assistBand ?? 0.15;
    this.assist = options.assist ?? null;
    this.assistTimeoutMs = options.assistTimeoutMs ?? 5000;
  }

  getThreshold(): number {
    return this.threshold;
  }

  /**
   * Rule-only verdict. Pure: identical inputs give identical verdicts.
   *
   * @param newEntities - entities first seen in this same turn
   */
  detect(
    text: string,
    history: readonly ConversationTurn[],
    newEntities: readonly Entity[] = []
  ): Verdict {
    const strengths = this.patterns.scoreIndicators(text);

    let score = 0;
    for (const [category, strength] of strengths) {
      score += (CATEGORY_WEIGHTS[category] ?? DEFAULT_WEIGHT) * strength;
    }

    if (newEntities.some((e) => e.kind === "upi" || e.kind === "bankAccount")) {
      score += PAYMENT_ENTITY_BOOST;
    }

    if (this.patterns.hasTimePressure(text)) {
      score += URGENCY_BOOST;
    }

    // Categories the scammer already used in earlier turns keep the pressure on
    const earlier = new Set<string>();
    for (const turn of history) {
      if (turn.message.sender === "scammer") {
        turn.detectedCategories.forEach((c) => earlier.add(c));
      }
    }
    const carried = [...earlier].filter((c) => !strengths.has(c)).length;
    score += Math.min(carried * HISTORY_BOOST_PER_CATEGORY, HISTORY_BOOST_CAP);

    score = clamp01(score);
    const categories = [...strengths.keys()].sort();

    return {
      isScam: score >= this.threshold,
      score,
      categories,
      assisted: false,
    };
  }

  /**
   * Rule verdict, refined by the assist when the score is ambiguous.
   * Assist failure never fails detection.
   */
  async detectWithAssist(
    text: string,
    history: readonly ConversationTurn[],
    newEntities: readonly Entity[] = []
  ): Promise<Verdict> {
    const verdict = this.detect(text, history, newEntities);
    const assist = this.assist;

    if (!assist || Math.abs(verdict.score - this.threshold) > this.assistBand) {
      return verdict;
    }

    try {
      const opinion = await withTimeout(
        (signal) => assist.assess(text, history, signal),
        this.assistTimeoutMs,
        "scam assist"
      );
      const confidence = clamp01(opinion.confidence);
      // Confidence is in the assist's own decision; turn it into P(scam)
      const scamProbability = opinion.isScam ? confidence : 1 - confidence;
      const score = clamp01((verdict.score + scamProbability) / 2);

      logger.debug(
        {
          rule_score: verdict.score,
          assist_confidence: opinion.confidence,
          assist_is_scam: opinion.isScam,
          score,
        },
        "Assist consulted for ambiguous score"
      );

      return {
        isScam: score >= this.threshold,
        score,
        categories: verdict.categories,
        assisted: true,
      };
    } catch (error) {
      logger.warn(
        { rule_score: verdict.score, error: errorMessage(error) },
        "Scam assist failed, using rule verdict"
      );
      return verdict;
    }
  }
}
