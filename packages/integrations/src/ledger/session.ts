/**
 * Ledger Session Cache
 * Holds the one ledger token a process presents, expiring it ahead of the server.
 */

/** Remote sessions live 15 minutes; refresh a minute early */
export const DEFAULT_SESSION_TTL_MS = 14 * 60 * 1000;

export interface SessionToken {
  value: string;
  acquiredAt: number;
  ttlMs: number;
}

export interface SessionTokenCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Shared by every ledger client in a process. All methods are synchronous,
 * so reads and writes cannot interleave on the event loop.
 */
export class SessionTokenCache {
  readonly ttlMs: number;
  private readonly now: () => number;
  private entry: SessionToken | null = null;

  constructor(options: SessionTokenCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * The cached token while younger than the TTL, otherwise null
   */
  get(): string | null {
    if (!this.entry) {
      return null;
    }
    if (this.now() >= this.entry.acquiredAt + this.entry.ttlMs) {
      return null;
    }
    return this.entry.value;
  }

  set(value: string): void {
    this.entry = { value, acquiredAt: this.now(), ttlMs: this.ttlMs };
  }

  invalidate(): void {
    this.entry = null;
  }

  /** Milliseconds until the cached token expires, 0 when none is live */
  remainingMs(): number {
    if (!this.entry) {
      return 0;
    }
    return Math.max(0, this.entry.acquiredAt + this.entry.ttlMs - this.now());
  }
}
