/**
 * Cycle context.
 *
 * AsyncLocalStorage-based context so every log line written while a unit
 * works on one distillation, decision or motor call carries the same ids
 * without threading them through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface CycleContext {
  /** Scheduled unit doing the work (distiller name, "will", "ingress", ...) */
  unit: string;
  /** One distillation / decision / motor call */
  cycleId: string;
  /** Entity that caused this cycle, when there is one */
  causeId?: string | undefined;
}

const storage = new AsyncLocalStorage<CycleContext>();

/**
 * Run `fn` with a cycle context; descendants inherit it.
 */
export function withCycleContext<T>(context: CycleContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getCycleContext(): CycleContext | undefined {
  return storage.getStore();
}

/**
 * Short id for a new cycle.
 */
export function newCycleId(unit: string): string {
  return `${unit}_${randomUUID().slice(0, 8)}`;
}
