import { createHash } from 'node:crypto';

/**
 * What a decision is based on. Two decisions over equal snapshots would
 * ask the model the same question.
 */
export interface DecisionSnapshot {
  impression: string;
  recalled: string[];
  manifest: string;
}

/**
 * JSON with object keys sorted at every depth.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function snapshotHash(snapshot: DecisionSnapshot): string {
  return createHash('sha256').update(canonicalJson(snapshot)).digest('hex');
}

/**
 * Skips a snapshot hash that was evaluated less than `minIntervalMs` ago.
 */
export class SnapshotThrottle {
  private readonly evaluated = new Map<string, number>();
  private readonly minIntervalMs: number;
  private readonly now: () => number;

  constructor(minIntervalMs: number, now: () => number = Date.now) {
    this.minIntervalMs = minIntervalMs;
    this.now = now;
  }

  /**
   * True when `hash` should be evaluated; records it as evaluated now.
   */
  admit(hash: string): boolean {
    const now = this.now();
    this.prune(now);
    const last = this.evaluated.get(hash);
    if (last !== undefined && now - last < this.minIntervalMs) {
      return false;
    }
    this.evaluated.set(hash, now);
    return true;
  }

  private prune(now: number): void {
    for (const [hash, at] of this.evaluated) {
      if (now - at >= this.minIntervalMs) {
        this.evaluated.delete(hash);
      }
    }
  }
}
