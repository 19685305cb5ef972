export type RestartPolicyOptions = {
  /** Restarts allowed before giving up; undefined means unlimited. */
  maxRestarts?: number;
  delayMs: number;
  /** A run lasting at least this long clears the restart count. */
  resetAfterMs: number;
  now?: () => number;
};

export type RestartDecision =
  | { restart: true; attempt: number; delayMs: number }
  | { restart: false; attempts: number };

export class RestartPolicy {
  private attempts = 0;
  private startedAt: number | null = null;
  private lastFailure: number | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: RestartPolicyOptions) {
    this.now = opts.now ?? Date.now;
  }

  get restarts(): number {
    return this.attempts;
  }

  get lastFailureAt(): number | null {
    return this.lastFailure;
  }

  markStarted(): void {
    this.startedAt = this.now();
  }

  /** Records that the supervised task ended and decides whether it runs again. */
  onExit(): RestartDecision {
    const t = this.now();
    if (this.startedAt !== null && t - this.startedAt >= this.opts.resetAfterMs) this.attempts = 0;
    this.startedAt = null;
    this.lastFailure = t;

    if (this.opts.maxRestarts !== undefined && this.attempts >= this.opts.maxRestarts) {
      return { restart: false, attempts: this.attempts };
    }
    this.attempts += 1;
    return { restart: true, attempt: this.attempts, delayMs: this.opts.delayMs };
  }
}
