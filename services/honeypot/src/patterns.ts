import { z } from "zod";
import indicatorData from "./data/indicators.json";
import { EntityKind } from "./types";

const termSchema = z.object({
  term: z.string().min(1),
  pattern: z.string().min(1).optional(),
  strength: z.number().min(0).max(1),
});

const vocabularySchema = z.object({
  categories: z.record(z.string(), z.array(termSchema).min(1)),
  timePressure: z.array(z.string().min(1)),
  accountKeywords: z.array(z.string().min(1)),
  contactKeywords: z.array(z.string().min(1)),
  paymentKeywords: z.array(z.string().min(1)),
  upiProviders: z.array(z.string().min(1)),
  spelledDigits: z.record(z.string(), z.string().regex(/^\d$/)),
  endPhrases: z.array(z.string().min(1)),
});

export type IndicatorVocabulary = z.infer<typeof vocabularySchema>;

export interface Span {
  start: number;
  end: number;
}

/**
 * How an entity candidate was written. Drives confidence scoring.
 */
export type MatchForm =
  | "upi"
  | "url"
  | "international"
  | "grouped"
  | "bare"
  | "spelled";

export interface EntityMatch {
  /** More than one candidate means the extractor must disambiguate */
  candidates: readonly EntityKind[];
  raw: string;
  /** Digits only, for numeric forms */
  digits?: string;
  span: Span;
  form: MatchForm;
}

export interface IndicatorHit {
  category: string;
  term: string;
  span: Span;
}

export interface KeywordContext {
  account: boolean;
  contact: boolean;
  payment: boolean;
}

interface CompiledTerm {
  category: string;
  term: string;
  strength: number;
  regex: RegExp;
}

const URL_PATTERNS = [
  /\bhttps?:\/\/[^\s<>"{}|\\^`[\]]+/gi,
  /\bwww\.[a-z0-9-]+(?:\.[a-z0-9-]+)+(?:\/[^\s<>"]*)?/gi,
  /\b(?:bit\.ly|tinyurl\.com|goo\.gl|t\.co|rb\.gy|cutt\.ly|is\.gd)\/[a-z0-9_-]+/gi,
];

// Provider part must not continue into a domain (john@example.com is an email)
const UPI_PATTERN =
  /(?<![\w.-])[a-z0-9][a-z0-9._-]{0,255}@[a-z][a-z0-9]{1,63}\b(?!\.[a-z0-9])/gi;

const PHONE_PATTERNS: Array<{ regex: RegExp; form: MatchForm }> = [
  // +91 98765 43210, 0091-9876543210
  {
    regex: /(?<![\w+])(?:\+|00)91[\s.-]?[6-9]\d{4}[\s.-]?\d{5}(?!\d)/g,
    form: "international",
  },
  // Any other country code
  {
    regex: /(?<![\w+])(?:\+|00)[1-9]\d{0,2}(?:[\s.-]?\(?\d\)?){6,12}(?!\d)/g,
    form: "international",
  },
  // 98765 43210, 098765-43210
  { regex: /(?<![\w+])0?[6-9]\d{4}[\s.-]\d{5}(?!\d)/g, form: "grouped" },
  // (555) 123-4567, 555.123.4567
  { regex: /(?<![\w+])\(?\d{3}\)?[\s.-]\d{3}[\s.-]\d{4}(?!\d)/g, form: "grouped" },
];

const DIGIT_RUN_PATTERN = /(?<![\d+])\d{9,18}(?!\d)/g;

const TRAILING_PUNCTUATION = /[.,;:!?)'"\]]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile a literal phrase into a case-insensitive whole-word matcher.
 */
function phraseRegExp(phrase: string, flags = "i"): RegExp {
  const body = escapeRegExp(phrase.trim()).replace(/\s+/g, "\\s+");
  const head = /^\w/.test(phrase) ? "\\b" : "";
  const tail = /\w$/.test(phrase) ? "\\b" : "";
  return new RegExp(`${head}${body}${tail}`, flags);
}

function overlaps(span: Span, taken: Span[]): boolean {
  return taken.some((t) => span.start < t.end && t.start < span.end);
}

/**
 * Candidate kinds for a run of digits.
 * A 10-digit mobile-looking number could also be the tail of an account.
 */
export function classifyDigits(digits: string): EntityKind[] {
  const mobile =
    /^[6-9]\d{9}$/.test(digits) ||
    /^0[6-9]\d{9}$/.test(digits) ||
    /^91[6-9]\d{9}$/.test(digits);
  if (mobile) {
    return ["phone", "bankAccount"];
  }
  if (digits.length >= 9 && digits.length <= 18) {
    return ["bankAccount"];
  }
  return [];
}

/**
 * Compiled matchers for entity extraction and scam-indicator scoring.
 *
 * Built once from the indicator vocabulary and never mutated afterwards, so a
 * single instance is shared by the extractor, the detector and the agent's
 * self-leak guard.
 */
export class PatternLibrary {
  private readonly terms: readonly CompiledTerm[];
  private readonly timePressure: readonly RegExp[];
  private readonly accountKeywords: readonly RegExp[];
  private readonly contactKeywords: readonly RegExp[];
  private readonly paymentKeywords: readonly RegExp[];
  private readonly endPhrases: readonly RegExp[];
  private readonly upiProviders: ReadonlySet<string>;
  private readonly spelledDigits: Readonly<Record<string, string>>;
  private readonly spelledPattern: RegExp;
  readonly categories: readonly string[];

  private constructor(vocabulary: IndicatorVocabulary) {
    const terms: CompiledTerm[] = [];
    for (const [category, entries] of Object.entries(vocabulary.categories)) {
      for (const entry of entries) {
        terms.push({
          category,
          term: entry.term,
          strength: entry.strength,
          regex: entry.pattern
            ? new RegExp(entry.pattern, "i")
            : phraseRegExp(entry.term),
        });
      }
    }

    this.terms = Object.freeze(terms);
    this.categories = Object.freeze(Object.keys(vocabulary.categories));
    this.timePressure = Object.freeze(
      vocabulary.timePressure.map((source) => new RegExp(source, "i"))
    );
    this.accountKeywords = Object.freeze(
      vocabulary.accountKeywords.map((k) => phraseRegExp(k))
    );
    this.contactKeywords = Object.freeze(
      vocabulary.contactKeywords.map((k) => phraseRegExp(k))
    );
    this.paymentKeywords = Object.freeze(
      vocabulary.paymentKeywords.map((k) => phraseRegExp(k))
    );
    this.endPhrases = Object.freeze(
      vocabulary.endPhrases.map((p) => phraseRegExp(p))
    );
    this.upiProviders = new Set(
      vocabulary.upiProviders.map((p) => p.toLowerCase())
    );
    this.spelledDigits = Object.freeze({ ...vocabulary.spelledDigits });

    const words = Object.keys(vocabulary.spelledDigits)
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join("|");
    this.spelledPattern = new RegExp(
      `\\b(?:${words})(?:[\\s,-]+(?:${words})){9,}\\b`,
      "gi"
    );
  }

  /**
   * Validate a vocabulary and compile it.
   * Defaults to the bundled indicator data.
   */
  static compile(vocabulary: unknown = indicatorData): PatternLibrary {
    const library = new PatternLibrary(vocabularySchema.parse(vocabulary));
    Object.freeze(library);
    return library;
  }

  /**
   * Find phone, UPI, bank account and URL candidates in text.
   * Later pattern families never claim characters an earlier family matched.
   */
  match(text: string): EntityMatch[] {
    const matches: EntityMatch[] = [];
    const taken: Span[] = [];

    const accept = (match: EntityMatch): void => {
      if (match.candidates.length === 0 || overlaps(match.span, taken)) {
        return;
      }
      taken.push(match.span);
      matches.push(match);
    };

    // URLs first: they may contain digits and @ signs
    for (const regex of URL_PATTERNS) {
      for (const found of text.matchAll(regex)) {
        const start = found.index ?? 0;
        const raw = found[0].replace(TRAILING_PUNCTUATION, "");
        accept({
          candidates: ["url"],
          raw,
          span: { start, end: start + raw.length },
          form: "url",
        });
      }
    }

    for (const found of text.matchAll(UPI_PATTERN)) {
      const start = found.index ?? 0;
      accept({
        candidates: ["upi"],
        raw: found[0],
        span: { start, end: start + found[0].length },
        form: "upi",
      });
    }

    for (const { regex, form } of PHONE_PATTERNS) {
      for (const found of text.matchAll(regex)) {
        const start = found.index ?? 0;
        accept({
          candidates: ["phone"],
          raw: found[0],
          digits: found[0].replace(/\D/g, ""),
          span: { start, end: start + found[0].length },
          form,
        });
      }
    }

    for (const found of text.matchAll(DIGIT_RUN_PATTERN)) {
      const start = found.index ?? 0;
      accept({
        candidates: classifyDigits(found[0]),
        raw: found[0],
        digits: found[0],
        span: { start, end: start + found[0].length },
        form: "bare",
      });
    }

    for (const found of text.matchAll(this.spelledPattern)) {
      const start = found.index ?? 0;
      const digits = this.spelledToDigits(found[0]);
      accept({
        candidates: classifyDigits(digits),
        raw: found[0],
        digits,
        span: { start, end: start + found[0].length },
        form: "spelled",
      });
    }

    return matches.sort((a, b) => a.span.start - b.span.start);
  }

  /**
   * Every indicator term found in text, at most one hit per term.
   */
  findIndicators(text: string): IndicatorHit[] {
    const hits: IndicatorHit[] = [];
    for (const compiled of this.terms) {
      const found = compiled.regex.exec(text);
      if (found) {
        hits.push({
          category: compiled.category,
          term: compiled.term,
          span: { start: found.index, end: found.index + found[0].length },
        });
      }
    }
    return hits;
  }

  /**
   * Strength per scam category: probabilistic union of matched term strengths.
   * Categories with no hit are absent.
   */
  scoreIndicators(text: string): Map<string, number> {
    const misses = new Map<string, number>();
    for (const compiled of this.terms) {
      if (compiled.regex.test(text)) {
        const miss = misses.get(compiled.category) ?? 1;
        misses.set(compiled.category, miss * (1 - compiled.strength));
      }
    }

    const strengths = new Map<string, number>();
    for (const [category, miss] of misses) {
      strengths.set(category, 1 - miss);
    }
    return strengths;
  }

  hasTimePressure(text: string): boolean {
    return this.timePressure.some((regex) => regex.test(text));
  }

  containsEndPhrase(text: string): boolean {
    return this.endPhrases.some((regex) => regex.test(text));
  }

  isKnownUpiProvider(provider: string): boolean {
    return this.upiProviders.has(provider.toLowerCase());
  }

  /**
   * Which keyword families appear within `window` characters of a span.
   */
  contextAround(text: string, span: Span, window = 40): KeywordContext {
    const before = text.slice(Math.max(0, span.start - window), span.start);
    const after = text.slice(span.end, span.end + window);
    const context = `${before} ${after}`;
    return {
      account: this.accountKeywords.some((regex) => regex.test(context)),
      contact: this.contactKeywords.some((regex) => regex.test(context)),
      payment: this.paymentKeywords.some((regex) => regex.test(context)),
    };
  }

  private spelledToDigits(phrase: string): string {
    return phrase
      .toLowerCase()
      .split(/[\s,-]+/)
      .map((word) => this.spelledDigits[word] ?? "")
      .join("");
  }
}
