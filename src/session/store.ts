import { randomBytes } from "node:crypto";
import { Unauthenticated } from "../errors.js";
import type { Credentials } from "../mail/types.js";

/** 32 bytes = 256 bits of entropy */
const TOKEN_BYTES = 32;

export interface Session extends Credentials {
  token: string;
  createdAt: Date;
}

export interface SessionStore {
  create(address: string, secret: string): string;
  /** Throws Unauthenticated for unknown or expired tokens. */
  resolve(token: string): Credentials;
  /** Idempotent. */
  invalidate(token: string): void;
  readonly size: number;
}

export interface SessionStoreOptions {
  /**
   * Session lifetime in milliseconds; 0 or absent keeps sessions until logout.
   * Expired sessions are dropped when their token is resolved and whenever a
   * new session is created.
   */
  ttlMs?: number;
  now?: () => Date;
}

/**
 * Process-local session store. Credentials stay in memory only.
 *
 * Every method is synchronous, so an insert, lookup or delete completes before
 * any other request can touch the map.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  create(address: string, secret: string): string {
    this.pruneExpired();
    const token = randomBytes(TOKEN_BYTES).toString("base64url");
    this.sessions.set(token, { token, address, secret, createdAt: this.now() });
    return token;
  }

  resolve(token: string): Credentials {
    const session = this.sessions.get(token);
    if (!session) {
      throw new Unauthenticated();
    }
    if (this.isExpired(session)) {
      this.sessions.delete(token);
      throw new Unauthenticated();
    }
    return { address: session.address, secret: session.secret };
  }

  invalidate(token: string): void {
    this.sessions.delete(token);
  }

  private pruneExpired(): void {
    if (this.ttlMs <= 0) return;
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(token);
      }
    }
  }

  private isExpired(session: Session): boolean {
    if (this.ttlMs <= 0) return false;
    return this.now().getTime() - session.createdAt.getTime() >= this.ttlMs;
  }
}
