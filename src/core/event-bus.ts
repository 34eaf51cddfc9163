import type { Logger } from '../types/logger.js';
import type {
  Impression,
  Intention,
  Lifecycle,
  MotorCall,
  Outcome,
  Sensation,
} from '../types/entities.js';

/**
 * Observability events. Nothing in the runtime depends on anyone listening.
 */
export type RuntimeEvent =
  | { type: 'lifecycle'; lifecycle: Lifecycle }
  | { type: 'thought'; sensation: Sensation }
  | { type: 'impression'; impression: Impression }
  | { type: 'intention'; intention: Intention }
  | { type: 'outcome'; motorCall: MotorCall; outcome: Outcome }
  | { type: 'health'; unit: string; category: string; degraded: boolean; consecutiveFailures: number };

export type RuntimeEventType = RuntimeEvent['type'];

export type EventHandler = (event: RuntimeEvent) => void | Promise<void>;

interface Subscription {
  id: string;
  handler: EventHandler;
  type: RuntimeEventType | undefined;
}

/**
 * EventBus - subscribable stream of runtime events.
 *
 * Handlers run in parallel; a failing handler is logged and never reaches
 * the publisher.
 */
export class EventBus {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'event-bus' });
  }

  /**
   * Subscribe to all events, or to one event type.
   *
   * @returns Subscription ID for unsubscribing
   */
  subscribe(handler: EventHandler, type?: RuntimeEventType): string {
    const id = `sub_${String(this.nextId++)}`;
    this.subscriptions.push({ id, handler, type });
    this.logger.debug({ subscriptionId: id, type }, 'Subscription added');
    return id;
  }

  unsubscribe(subscriptionId: string): boolean {
    const index = this.subscriptions.findIndex((s) => s.id === subscriptionId);
    if (index >= 0) {
      this.subscriptions.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Publish an event to all matching subscribers.
   *
   * @returns Number of handlers that received the event
   */
  async publish(event: RuntimeEvent): Promise<number> {
    const matching = this.subscriptions.filter((s) => s.type === undefined || s.type === event.type);
    if (matching.length === 0) {
      return 0;
    }

    const results = await Promise.allSettled(
      matching.map((sub) => Promise.resolve().then(() => sub.handler(event)))
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          {
            subscriptionId: matching[index]?.id,
            eventType: event.type,
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          },
          'Event handler failed'
        );
      }
    });

    return matching.length;
  }

  /**
   * Publish without waiting for handlers.
   */
  emit(event: RuntimeEvent): void {
    void this.publish(event);
  }

  subscriptionCount(): number {
    return this.subscriptions.length;
  }

  clear(): void {
    this.subscriptions = [];
  }
}

export function createEventBus(logger: Logger): EventBus {
  return new EventBus(logger);
}
