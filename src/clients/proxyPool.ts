import { PROXY_LIMITS } from "../config/jobs";
import { log, LogLevel } from "../utils/logger";

export interface ProxyRecord {
  address: string;
  consecutiveFailures: number;
  successCount: number;
  failureCount: number;
  cooldownUntil: number; // epoch ms, 0 when never cooled down
  cooldownCycles: number;
  health: number; // moving average of outcomes, 0..1
}

export interface ProxyHandle {
  readonly address: string;
  readonly leaseId: number;
}

export interface ProxyPoolOptions {
  failureThreshold?: number;
  baseCooldownMs?: number;
  maxCooldownMs?: number;
  healthAlpha?: number;
  now?: () => number;
  random?: () => number;
}

/**
 * Tracks egress proxies and hands them out weighted by health.
 *
 * acquire() and reportOutcome() are synchronous, so every mutation runs to
 * completion on the event loop before another worker can observe the record.
 */
export class ProxyPool {
  private readonly records = new Map<string, ProxyRecord>();
  private readonly openLeases = new Map<number, string>();
  private nextLeaseId = 1;

  private readonly failureThreshold: number;
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly healthAlpha: number;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(addresses: string[], options: ProxyPoolOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? PROXY_LIMITS.FAILURE_THRESHOLD;
    this.baseCooldownMs = options.baseCooldownMs ?? PROXY_LIMITS.BASE_COOLDOWN_MS;
    this.maxCooldownMs = options.maxCooldownMs ?? PROXY_LIMITS.MAX_COOLDOWN_MS;
    this.healthAlpha = options.healthAlpha ?? PROXY_LIMITS.HEALTH_ALPHA;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;

    for (const address of addresses) {
      this.add(address);
    }
  }

  get size(): number {
    return this.records.size;
  }

  /** Registers a newly discovered proxy; known addresses are left untouched. */
  add(address: string): void {
    if (this.records.has(address)) return;
    this.records.set(address, {
      address,
      consecutiveFailures: 0,
      successCount: 0,
      failureCount: 0,
      cooldownUntil: 0,
      cooldownCycles: 0,
      health: 1
    });
  }

  isEligible(record: ProxyRecord, at: number = this.now()): boolean {
    if (record.consecutiveFailures < this.failureThreshold) return true;
    return at >= record.cooldownUntil;
  }

  /**
   * Picks a proxy at random, weighted by health, among records that are not
   * cooling down and not excluded.
   * @returns A lease on the proxy, or null when nothing is eligible
   */
  acquire(options: { exclude?: string[] } = {}): ProxyHandle | null {
    const at = this.now();
    const excluded = new Set(options.exclude ?? []);
    const candidates = [...this.records.values()].filter(
      (record) => !excluded.has(record.address) && this.isEligible(record, at)
    );

    if (candidates.length === 0) return null;

    const weights = candidates.map((record) =>
      Math.max(record.health, PROXY_LIMITS.MIN_WEIGHT)
    );
    const total = weights.reduce((sum, weight) => sum + weight, 0);

    let roll = this.random() * total;
    let chosen = candidates[candidates.length - 1];
    for (let i = 0; i < candidates.length; i++) {
      roll -= weights[i];
      if (roll < 0) {
        chosen = candidates[i];
        break;
      }
    }

    const leaseId = this.nextLeaseId++;
    this.openLeases.set(leaseId, chosen.address);
    return { address: chosen.address, leaseId };
  }

  /**
   * Records the outcome of one request made through a leased proxy.
   * Each lease is reported once; later reports for the same lease are ignored.
   */
  reportOutcome(handle: ProxyHandle, success: boolean): void {
    if (this.openLeases.get(handle.leaseId) !== handle.address) {
      log(
        LogLevel.WARN,
        "ProxyPool",
        `Ignoring duplicate or unknown report for lease ${handle.leaseId} (${handle.address})`
      );
      return;
    }
    this.openLeases.delete(handle.leaseId);

    const record = this.records.get(handle.address);
    if (!record) return;

    const outcome = success ? 1 : 0;
    record.health = this.healthAlpha * outcome + (1 - this.healthAlpha) * record.health;

    if (success) {
      record.successCount++;
      record.consecutiveFailures = 0;
      record.cooldownCycles = 0;
      record.cooldownUntil = 0;
      return;
    }

    record.failureCount++;
    record.consecutiveFailures++;

    // Late reports from leases taken before the cooldown started do not open a new cycle
    const at = this.now();
    if (at < record.cooldownUntil) return;

    if (record.consecutiveFailures >= this.failureThreshold) {
      const cooldownMs = Math.min(
        this.baseCooldownMs * 2 ** record.cooldownCycles,
        this.maxCooldownMs
      );
      record.cooldownUntil = at + cooldownMs;
      record.cooldownCycles++;
      log(
        LogLevel.WARN,
        "ProxyPool",
        `${redact(record.address)} failed ${record.consecutiveFailures}x, cooling down for ${Math.round(
          cooldownMs / 1000
        )}s`
      );
    }
  }

  /** Copies of every record, for reporting */
  snapshot(): ProxyRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }
}

/** Strips credentials from a proxy URL before it is logged. */
export function redact(address: string): string {
  try {
    const url = new URL(address);
    if (url.username || url.password) {
      url.username = "***";
      url.password = "";
    }
    return url.toString().replace(/\/$/, "");
  } catch {
    return address;
  }
}
