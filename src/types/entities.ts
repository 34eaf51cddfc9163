/**
 * Memory entities.
 *
 * Everything the runtime perceives, summarizes, intends and does is recorded
 * as one of these immutable records. Ids are UUIDs; the store refuses a
 * second record under the same id.
 */

import { randomUUID } from 'node:crypto';

/**
 * Abstraction level of an impression. Ordered: instant < situation < episode < narrative.
 */
export const IMPRESSION_LEVELS = ['instant', 'situation', 'episode', 'narrative'] as const;

export type ImpressionLevel = (typeof IMPRESSION_LEVELS)[number];

/**
 * Compare two levels (negative when `a` is lower than `b`).
 */
export function compareLevels(a: ImpressionLevel, b: ImpressionLevel): number {
  return IMPRESSION_LEVELS.indexOf(a) - IMPRESSION_LEVELS.indexOf(b);
}

/**
 * Where a sensation came from.
 */
export interface SensationSource {
  /** Modality, e.g. "chat", "heard", "seen", "thought" */
  modality: string;
  /** Device or adapter that produced it */
  device?: string | undefined;
}

/**
 * What produced a sensation.
 * - sensation: an adapter (ingress, pipe)
 * - thought: free text the Will emitted outside of any action tag
 * - feedback: an impression re-entering its own distiller
 * - outcome: a motor reporting back what it observed
 */
export type SensationKind = 'sensation' | 'thought' | 'feedback' | 'outcome';

export interface Sensation {
  readonly type: 'sensation';
  readonly id: string;
  readonly timestamp: Date;
  readonly kind: SensationKind;
  readonly source: SensationSource;
  readonly text: string;
}

export interface Impression {
  readonly type: 'impression';
  readonly id: string;
  readonly timestamp: Date;
  readonly level: ImpressionLevel;
  readonly text: string;
  /** Name of the distiller that produced it */
  readonly producer: string;
}

export interface Intention {
  readonly type: 'intention';
  readonly id: string;
  readonly timestamp: Date;
  readonly action: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** Full body text (for streamed bodies, what had arrived when the tag closed) */
  readonly body: string;
}

export interface MotorCall {
  readonly type: 'motor_call';
  readonly id: string;
  readonly intentionId: string;
  readonly action: string;
  readonly startedAt: Date;
}

export interface Completion {
  readonly type: 'completion';
  readonly id: string;
  readonly motorCallId: string;
  readonly timestamp: Date;
  readonly result: string;
}

export type InterruptionCause = 'superseded' | 'error' | 'cancelled';

export interface Interruption {
  readonly type: 'interruption';
  readonly id: string;
  readonly motorCallId: string;
  readonly timestamp: Date;
  readonly cause: InterruptionCause;
  readonly detail: string;
}

export type LifecycleEventKind = 'started' | 'stopped' | 'crashed' | 'restarted' | 'terminated';

export interface Lifecycle {
  readonly type: 'lifecycle';
  readonly id: string;
  readonly timestamp: Date;
  readonly unit: string;
  readonly event: LifecycleEventKind;
  readonly detail?: string | undefined;
}

export type Entity =
  | Sensation
  | Impression
  | Intention
  | MotorCall
  | Completion
  | Interruption
  | Lifecycle;

export type EntityType = Entity['type'];

/**
 * Narrow an entity union by its type tag.
 */
export type EntityOf<K extends EntityType> = Extract<Entity, { type: K }>;

/**
 * Terminal record of a motor call.
 */
export type Outcome = Completion | Interruption;

/**
 * Relationship kinds between entities.
 * - SUMMARIZES: impression -> each source it compresses
 * - FEEDBACK_OF: feedback sensation -> the impression it re-enters as
 * - INVOKES: motor call -> intention
 * - RESOLVES: completion/interruption -> motor call
 */
export type Relation = 'SUMMARIZES' | 'FEEDBACK_OF' | 'INVOKES' | 'RESOLVES';

export interface Edge {
  readonly from: string;
  readonly relation: Relation;
  readonly to: string;
}

/**
 * Anything a distiller can take as input.
 */
export type Experience = Sensation | Impression;

export function createSensation(
  text: string,
  source: SensationSource,
  options: { kind?: SensationKind; timestamp?: Date } = {}
): Sensation {
  return {
    type: 'sensation',
    id: randomUUID(),
    timestamp: options.timestamp ?? new Date(),
    kind: options.kind ?? 'sensation',
    source,
    text,
  };
}

export function createImpression(
  level: ImpressionLevel,
  text: string,
  producer: string,
  timestamp: Date = new Date()
): Impression {
  return { type: 'impression', id: randomUUID(), timestamp, level, text, producer };
}

export function createIntention(
  action: string,
  attributes: Record<string, string>,
  body: string,
  options: { id?: string; timestamp?: Date } = {}
): Intention {
  return {
    type: 'intention',
    id: options.id ?? randomUUID(),
    timestamp: options.timestamp ?? new Date(),
    action,
    attributes,
    body,
  };
}

export function createLifecycle(
  unit: string,
  event: LifecycleEventKind,
  detail?: string
): Lifecycle {
  return {
    type: 'lifecycle',
    id: randomUUID(),
    timestamp: new Date(),
    unit,
    event,
    detail,
  };
}
