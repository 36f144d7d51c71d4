/**
 * DOGE Provider — Collaborator Health
 *
 * Failure bookkeeping for one network collaborator. After a failure the
 * collaborator sits out a penalty window that doubles with each further
 * consecutive failure, up to a ceiling; one success clears the streak.
 */

export interface CollaboratorHealthStatus {
  name: string;
  /** false while a failure streak is open */
  healthy: boolean;
  lastError?: string;
  lastErrorAt?: number;
  /** When the collaborator is tried first again (ms since epoch) */
  retryAt?: number;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
}

export interface CollaboratorHealthOptions {
  /** Penalty after the first failure (ms). Default: 60000 */
  penaltyMs?: number;
  /** Ceiling for the doubled penalty (ms). Default: 8 × penaltyMs */
  maxPenaltyMs?: number;
  now?: () => number;
}

export class CollaboratorHealth {
  readonly name: string;

  private readonly penaltyMs: number;
  private readonly maxPenaltyMs: number;
  private readonly now: () => number;

  private lastError: string | undefined;
  private lastErrorAt: number | undefined;
  private retryAt = 0;
  private consecutiveFailures = 0;
  private totalRequests = 0;
  private totalFailures = 0;

  constructor(name: string, opts: CollaboratorHealthOptions = {}) {
    this.name = name;
    this.penaltyMs = opts.penaltyMs ?? 60_000;
    this.maxPenaltyMs = opts.maxPenaltyMs ?? this.penaltyMs * 8;
    this.now = opts.now ?? Date.now;
  }

  recordFailure(error: string): void {
    const at = this.now();
    this.consecutiveFailures++;
    this.totalFailures++;
    this.totalRequests++;
    this.lastError = error;
    this.lastErrorAt = at;
    const penalty = Math.min(this.penaltyMs * 2 ** (this.consecutiveFailures - 1), this.maxPenaltyMs);
    this.retryAt = at + penalty;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.retryAt = 0;
    this.totalRequests++;
  }

  /** True unless a failure streak is open and its penalty has not run out */
  isAvailable(): boolean {
    return this.consecutiveFailures === 0 || this.now() >= this.retryAt;
  }

  status(): CollaboratorHealthStatus {
    const status: CollaboratorHealthStatus = {
      name: this.name,
      healthy: this.consecutiveFailures === 0,
      consecutiveFailures: this.consecutiveFailures,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
    if (this.lastError !== undefined) status.lastError = this.lastError;
    if (this.lastErrorAt !== undefined) status.lastErrorAt = this.lastErrorAt;
    if (this.consecutiveFailures > 0) status.retryAt = this.retryAt;
    return status;
  }
}
