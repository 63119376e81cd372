/**
 * AlertStateStore tracks the last dispatched alert per URL so repeated
 * alerts inside the cooldown window are suppressed.
 *
 * One timestamp per URL governs both error and slow alerts. An entry is
 * removed outright when the URL is observed healthy, which makes the next
 * degradation alert immediately instead of waiting out the cooldown.
 */
export class AlertStateStore {
  /** Map of URL -> last alert timestamp (ms) */
  private lastAlertTimes: Map<string, number> = new Map();

  /**
   * Decide whether an alert for this URL may be sent now.
   * @param url - Target URL.
   * @param now - Current time in epoch milliseconds.
   * @param cooldownMs - Cooldown window; 0 or less never suppresses.
   */
  shouldNotify(url: string, now: number, cooldownMs: number): boolean {
    if (cooldownMs <= 0) return true;

    const lastTime = this.lastAlertTimes.get(url);
    if (lastTime === undefined) return true;

    return (now - lastTime) >= cooldownMs;
  }

  /**
   * Record that an alert reached the notification channel.
   */
  recordAlert(url: string, now: number): void {
    this.lastAlertTimes.set(url, now);
  }

  /**
   * Forget all alert state for a URL.
   * @returns true if the URL had an active alert (i.e. it just recovered).
   */
  reset(url: string): boolean {
    return this.lastAlertTimes.delete(url);
  }

  getLastAlertAt(url: string): number | undefined {
    return this.lastAlertTimes.get(url);
  }

  /**
   * Copy of the current table for read-only consumers such as /health.
   */
  snapshot(): ReadonlyMap<string, number> {
    return new Map(this.lastAlertTimes);
  }

  /**
   * Clear all tracked cooldowns.
   */
  clear(): void {
    this.lastAlertTimes.clear();
  }

  /** Visible for testing */
  get size(): number {
    return this.lastAlertTimes.size;
  }
}
