/** Shared TypeScript types for the scam honeypot service */

export type Sender = "scammer" | "agent";

export interface Message {
  sender: Sender;
  text: string;
  timestamp: number;
}

export type EntityKind = "phone" | "upi" | "bankAccount" | "url";

export const ENTITY_KINDS: readonly EntityKind[] = [
  "phone",
  "upi",
  "bankAccount",
  "url",
];

export interface Entity {
  kind: EntityKind;
  value: string;
  firstSeenTurn: number;
  confidence: number;
}

export interface ConversationTurn {
  message: Message;
  detectedCategories: string[];
  extractedEntities: Entity[];
  matchedTerms: string[];
}

export interface Verdict {
  isScam: boolean;
  score: number;
  categories: string[];
  assisted: boolean;
}

export type SessionStatus = "active" | "expired";

export type ReportReason =
  | "payment_identifier"
  | "high_confidence"
  | "engagement_complete"
  | "session_expired";

export interface Session {
  id: string;
  createdAt: number;
  lastActiveAt: number;
  turns: ConversationTurn[];
  /** Keyed by `${kind}:${value}` */
  entities: Map<string, Entity>;
  verdictTrend: Verdict[];
  status: SessionStatus;
  reportedThresholds: Set<ReportReason>;
  agentNotes: string[];
  channel?: string;
  language?: string;
  locale?: string;
}

export interface RequestMetadata {
  channel?: string;
  language?: string;
  locale?: string;
}

export interface HoneypotRequest {
  sessionId: string;
  message: Message;
  conversationHistory: Message[];
  metadata: RequestMetadata;
}

export interface HoneypotResponse {
  status: "success" | "error";
  reply?: string;
  message?: string;
}

export interface HandleResult {
  sessionId: string;
  reply: string;
}

/** Intelligence lists in the shape the evaluation callback expects */
export interface ExtractedIntelligence {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
}

export interface IntelligenceReport {
  report_id: string;
  sessionId: string;
  reason: ReportReason;
  scamDetected: boolean;
  maxScore: number;
  categories: string[];
  totalMessagesExchanged: number;
  entities: Entity[];
  verdictTrend: Verdict[];
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
  reported_at: string;
}

export interface Persona {
  name: string;
  age: number;
  background: string[];
  languageStyle: string;
  samplePhrases: string[];
  /** Agent turns a payment or credential request is entertained before stalling */
  stallAfterTurns: number;
}

export interface HoneypotConfig {
  port: number;
  api_key: string | null;
  openai_api_key: string | null;
  openai_model: string;
  openai_base_url: string | null;
  scam_threshold: number;
  assist_band: number;
  high_confidence_threshold: number;
  inactivity_window_ms: number;
  sweep_interval_ms: number;
  generation_timeout_ms: number;
  history_window: number;
  callback_url: string | null;
  callback_timeout_ms: number;
  callback_max_attempts: number;
  redis_host: string | null;
  redis_port: number;
  circuit_breaker_threshold: number;
  circuit_breaker_reset_ms: number;
  max_message_length: number;
}

/** Builds the map key used for entity deduplication. */
export function entityKey(kind: EntityKind, value: string): string {
  return `${kind}:${value}`;
}
