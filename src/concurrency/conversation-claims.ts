/**
 * Exclusive, non-blocking claims keyed by conversation. A claim is the
 * in-flight flag: while one is held for a key, `tryClaim` for that key
 * returns undefined instead of queueing behind it.
 */
export interface Claim {
  readonly key: string;
  readonly active: boolean;
  /** Idempotent. */
  release(): void;
}

export class ConversationClaims {
  private held = new Map<string, Claim>();
  private idleWaiters: Array<() => void> = [];

  tryClaim(key: string): Claim | undefined {
    if (this.held.has(key)) return undefined;

    let active = true;
    const claim: Claim = {
      key,
      get active() {
        return active;
      },
      release: () => {
        if (!active) return;
        active = false;
        this.held.delete(key);
        if (this.held.size === 0) this.notifyIdle();
      },
    };
    this.held.set(key, claim);
    return claim;
  }

  isClaimed(key: string): boolean {
    return this.held.has(key);
  }

  /** Claim for `key` only if it is the one currently held. */
  owns(claim: Claim): boolean {
    return claim.active && this.held.get(claim.key) === claim;
  }

  get size(): number {
    return this.held.size;
  }

  /** Resolves once no claim is held. */
  waitForIdle(): Promise<void> {
    if (this.held.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
