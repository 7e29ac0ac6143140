/**
 * Optional wall-clock limit for a whole run
 */

import { DeadlineExceededError } from './errors';

export class Deadline {
  private readonly expiresAt: number;

  constructor(
    readonly seconds: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + seconds * 1000;
  }

  static after(seconds: number | undefined, now?: () => number): Deadline | undefined {
    return seconds == null ? undefined : new Deadline(seconds, now);
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  isExpired(): boolean {
    return this.now() >= this.expiresAt;
  }

  /**
   * Throw if the deadline has passed, or would pass after waiting `waitMs`.
   */
  assertCanContinue(operation: string, waitMs: number = 0): void {
    if (this.isExpired() || waitMs > this.remainingMs()) {
      throw new DeadlineExceededError(operation, this.seconds);
    }
  }
}
