export interface CooldownDecision {
  allowed: boolean;
  retryAfterSeconds: number;
}

const MEMORY_MAX_SIZE = 10_000;

/**
 * Per-user minimum spacing between accepted requests.
 */
export class UserCooldown {
  private readonly lastAcceptedAt = new Map<number, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  checkAndConsume(telegramUserId: number): CooldownDecision {
    if (this.cooldownMs <= 0) {
      return { allowed: true, retryAfterSeconds: 0 };
    }

    const now = this.now();
    const previous = this.lastAcceptedAt.get(telegramUserId);
    if (previous !== undefined && now - previous < this.cooldownMs) {
      const retryMs = this.cooldownMs - (now - previous);
      return {
        allowed: false,
        retryAfterSeconds: Math.max(1, Math.ceil(retryMs / 1_000)),
      };
    }

    this.lastAcceptedAt.delete(telegramUserId);
    this.lastAcceptedAt.set(telegramUserId, now);
    this.evictOldest();
    return { allowed: true, retryAfterSeconds: 0 };
  }

  private evictOldest(): void {
    while (this.lastAcceptedAt.size > MEMORY_MAX_SIZE) {
      const oldest = this.lastAcceptedAt.keys().next();
      if (oldest.done) {
        return;
      }
      this.lastAcceptedAt.delete(oldest.value);
    }
  }
}
