import { Session } from "./types";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const logger = createLogger("session-store");

export type ExpiryListener = (session: Session) => void;

export interface SessionStoreOptions {
  inactivityWindowMs: number;
  now?: () => number;
}

export interface SessionStats {
  active: number;
  archived: number;
}

/**
 * Per-key mutual exclusion built on promise chains.
 * Work on distinct keys never waits on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export function createSession(id: string, now: number): Session {
  return {
    id,
    createdAt: now,
    lastActiveAt: now,
    turns: [],
    entities: new Map(),
    verdictTrend: [],
    status: "active",
    reportedThresholds: new Set(),
    agentNotes: [],
  };
}

/**
 * Deep copy so callers can work on a draft and commit it atomically.
 */
export function cloneSession(session: Session): Session {
  return structuredClone(session);
}

/**
 * In-memory keyed session container. Owns creation, lazy expiry and
 * per-id exclusivity; nothing outside it holds the active map.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly lock = new KeyedLock();
  private readonly listeners: ExpiryListener[] = [];
  private readonly inactivityWindowMs: number;
  private readonly now: () => number;
  private archivedCount = 0;

  constructor(options: SessionStoreOptions) {
    this.inactivityWindowMs = options.inactivityWindowMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a mutation with exclusive access to one session id.
   */
  runExclusive<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(id, fn);
  }

  /**
   * Return the active session for an id, creating it on first sight.
   * A session idle past the inactivity window is archived and replaced.
   */
  async getOrCreate(id: string): Promise<Session> {
    const now = this.now();
    const existing = this.sessions.get(id);

    if (existing && this.isExpired(existing, now)) {
      this.archive(existing);
      logger.info(
        {
          session_id: id,
          idle_ms: now - existing.lastActiveAt,
          turns: existing.turns.length,
        },
        "Session expired, recreating"
      );
    } else if (existing) {
      return existing;
    }

    const session = createSession(id, now);
    this.sessions.set(id, session);
    logger.info({ session_id: id }, "Created new session");
    return session;
  }

  /**
   * Store the session as the active state for its id.
   */
  async commit(session: Session): Promise<void> {
    session.lastActiveAt = this.now();
    this.sessions.set(session.id, session);
    logger.debug(
      {
        session_id: session.id,
        turns: session.turns.length,
        entities: session.entities.size,
      },
      "Session committed"
    );
  }

  /**
   * Read without locking, for health checks and diagnostics.
   */
  peek(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * Archive every expired session that is not mid-mutation.
   * Optional: lazy expiry in getOrCreate is what correctness relies on.
   */
  sweepExpired(): Session[] {
    const now = this.now();
    const expired: Session[] = [];
    for (const session of this.sessions.values()) {
      if (this.isExpired(session, now) && !this.lock.isLocked(session.id)) {
        expired.push(session);
      }
    }
    expired.forEach((session) => this.archive(session));

    if (expired.length > 0) {
      logger.info({ count: expired.length }, "Swept expired sessions");
    }
    return expired;
  }

  onExpire(listener: ExpiryListener): void {
    this.listeners.push(listener);
  }

  stats(): SessionStats {
    return { active: this.sessions.size, archived: this.archivedCount };
  }

  private isExpired(session: Session, now: number): boolean {
    return now - session.lastActiveAt > this.inactivityWindowMs;
  }

  private archive(session: Session): void {
    this.sessions.delete(session.id);
    session.status = "expired";
    this.archivedCount++;

    for (const listener of this.listeners) {
      try {
        listener(session);
      } catch (error) {
        logger.error(
          { session_id: session.id, error: errorMessage(error) },
          "Expiry listener failed"
        );
      }
    }
  }
}
