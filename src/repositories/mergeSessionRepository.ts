import { randomUUID } from "node:crypto";
import type { MergeSession } from "../domain/session";

/**
 * In-memory merge session store. Sessions idle for longer than the TTL are
 * swept on access and by sweepExpired().
 */
export class MergeSessionRepository {
  private readonly sessions = new Map<string, MergeSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  create(): MergeSession {
    this.sweepExpired();
    const timestamp = this.now();
    const session: MergeSession = {
      id: randomUUID(),
      createdAt: timestamp,
      lastAccessedAt: timestamp,
      sources: [],
      conflictPolicies: {},
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Get a live session and mark it as accessed.
   */
  get(id: string): MergeSession | undefined {
    this.sweepExpired();
    const session = this.sessions.get(id);
    if (session) session.lastAccessedAt = this.now();
    return session;
  }

  discard(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Remove idle sessions. Returns the number removed.
   */
  sweepExpired(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastAccessedAt <= cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }
}
