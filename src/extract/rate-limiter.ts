import { setTimeout as sleep } from 'node:timers/promises';

/** Spaces requests to the same host at least `minDelayMs` apart. One instance per client. */
export class HostRateLimiter {
  private readonly lastRequestAt = new Map<string, number>();

  constructor(private readonly minDelayMs: number) {}

  async acquire(url: string): Promise<void> {
    const host = new URL(url).host;
    const wait = (this.lastRequestAt.get(host) ?? 0) + this.minDelayMs - Date.now();
    if (wait > 0) await sleep(wait);
    this.lastRequestAt.set(host, Date.now());
  }
}
