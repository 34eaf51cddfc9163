/**
 * Health Monitor
 *
 * Handled failures (dropped distillation windows, failed store writes) never
 * stop a unit, so nothing else would notice when they keep happening. This
 * counts consecutive failures per unit and category and raises a degraded
 * signal once a threshold is crossed; the next success clears it.
 */

import type { Logger } from '../types/logger.js';
import type { EventBus } from './event-bus.js';

/**
 * Failure categories that can degrade health.
 * - llm: model call failed after all retries
 * - store: memory write failed
 */
export type HealthCategory = 'llm' | 'store';

export interface HealthStatus {
  unit: string;
  category: HealthCategory;
  consecutiveFailures: number;
  degraded: boolean;
  lastError: string | null;
  lastFailureAt: Date | null;
}

export interface HealthMonitorConfig {
  /** Consecutive failures before the unit is reported degraded */
  degradedThreshold: number;
}

const DEFAULT_CONFIG: HealthMonitorConfig = {
  degradedThreshold: 5,
};

export class HealthMonitor {
  private readonly statuses = new Map<string, HealthStatus>();
  private readonly logger: Logger;
  private readonly bus: EventBus | undefined;
  private readonly config: HealthMonitorConfig;

  constructor(logger: Logger, bus?: EventBus, config: Partial<HealthMonitorConfig> = {}) {
    this.logger = logger.child({ component: 'health' });
    this.bus = bus;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  recordFailure(unit: string, category: HealthCategory, error: string): void {
    const status = this.getOrCreate(unit, category);
    status.consecutiveFailures++;
    status.lastError = error;
    status.lastFailureAt = new Date();

    if (!status.degraded && status.consecutiveFailures >= this.config.degradedThreshold) {
      status.degraded = true;
      this.logger.warn(
        { unit, category, consecutiveFailures: status.consecutiveFailures, lastError: error },
        'Unit health degraded'
      );
      this.publish(status);
    }
  }

  recordSuccess(unit: string, category: HealthCategory): void {
    const status = this.statuses.get(this.key(unit, category));
    if (!status) return;

    const wasDegraded = status.degraded;
    status.consecutiveFailures = 0;
    status.degraded = false;

    if (wasDegraded) {
      this.logger.info({ unit, category }, 'Unit health recovered');
      this.publish(status);
    }
  }

  isDegraded(unit?: string): boolean {
    for (const status of this.statuses.values()) {
      if (status.degraded && (unit === undefined || status.unit === unit)) {
        return true;
      }
    }
    return false;
  }

  snapshot(): HealthStatus[] {
    return [...this.statuses.values()].map((s) => ({ ...s }));
  }

  private publish(status: HealthStatus): void {
    this.bus?.emit({
      type: 'health',
      unit: status.unit,
      category: status.category,
      degraded: status.degraded,
      consecutiveFailures: status.consecutiveFailures,
    });
  }

  private getOrCreate(unit: string, category: HealthCategory): HealthStatus {
    const key = this.key(unit, category);
    let status = this.statuses.get(key);
    if (!status) {
      status = {
        unit,
        category,
        consecutiveFailures: 0,
        degraded: false,
        lastError: null,
        lastFailureAt: null,
      };
      this.statuses.set(key, status);
    }
    return status;
  }

  private key(unit: string, category: HealthCategory): string {
    return `${unit}:${category}`;
  }
}

export function createHealthMonitor(
  logger: Logger,
  bus?: EventBus,
  config?: Partial<HealthMonitorConfig>
): HealthMonitor {
  return new HealthMonitor(logger, bus, config);
}
