import type { InterviewSession } from "../interviews/interview-session";

interface StoredSession {
  session: InterviewSession;
  lastAccessMs: number;
}

/** In-memory session map. Idle entries are evicted lazily whenever the store is touched. */
export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly ttlMs: number;

  constructor(
    ttlMinutes: number,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = ttlMinutes * 60_000;
  }

  set(session: InterviewSession): void {
    this.evictExpired();
    this.sessions.set(session.id, { session, lastAccessMs: this.now() });
  }

  get(sessionId: string): InterviewSession | null {
    this.evictExpired();
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    entry.lastAccessMs = this.now();
    return entry.session;
  }

  delete(sessionId: string): boolean {
    this.evictExpired();
    return this.sessions.delete(sessionId);
  }

  size(): number {
    this.evictExpired();
    return this.sessions.size;
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.lastAccessMs < cutoff) {
        this.sessions.delete(sessionId);
      }
    }
  }
}
