/**
 * Motors
 *
 * A motor is one named action the Will can request with a tag such as
 * `<speak>Hello</speak>`. The registry is the single capability table:
 * the manifest shown to the model and the executor's dispatch both read it,
 * so registering a motor is all it takes to add an action.
 */

import type { Intention, Sensation } from '../types/entities.js';
import type { Logger } from '../types/logger.js';

/**
 * Where motors send what they observe (file contents, recalled memories).
 * The container routes these back into the instant distiller.
 */
export type SensationSink = (sensation: Sensation) => void;

export interface MotorAttributeSchema {
  required: readonly string[];
  optional: readonly string[];
}

/**
 * What a motor gets for one call.
 */
export interface MotorContext {
  /** Action name and attributes; `body` is empty while a streamed body is still arriving */
  intention: Intention;
  /** Body text as it arrives. Ends when the closing tag is parsed. */
  body: AsyncIterable<string>;
  /** Aborts on supersede, timeout or shutdown */
  signal: AbortSignal;
  logger: Logger;
}

export interface Motor {
  readonly name: string;
  /** One line for the action manifest */
  readonly description: string;
  readonly attributes: MotorAttributeSchema;
  /** Receive the body while it streams instead of after the closing tag */
  readonly acceptsBody: boolean;
  /** Calls sharing this key supersede each other (e.g. "voice") */
  readonly exclusive?: string | undefined;
  /** Per-call time budget; the executor default applies when unset */
  readonly timeoutMs?: number | undefined;

  /**
   * Perform the action.
   * @returns Short result summary stored on the Completion
   */
  perform(context: MotorContext): Promise<string>;
}

/**
 * Render the tag form of one motor, e.g. `<read_source path="…" [max_bytes="…"]>body</read_source>`.
 */
export function renderMotorTag(motor: Motor): string {
  const attrs = [
    ...motor.attributes.required.map((name) => `${name}="…"`),
    ...motor.attributes.optional.map((name) => `[${name}="…"]`),
  ];
  const open = attrs.length > 0 ? `<${motor.name} ${attrs.join(' ')}>` : `<${motor.name}>`;
  return `${open}body</${motor.name}>`;
}

export class MotorRegistry {
  private readonly motors = new Map<string, Motor>();

  register(motor: Motor): void {
    if (!/^[a-zA-Z0-9_]+$/.test(motor.name)) {
      throw new Error(`Invalid motor name "${motor.name}"`);
    }
    if (this.motors.has(motor.name)) {
      throw new Error(`Motor "${motor.name}" is already registered`);
    }
    this.motors.set(motor.name, motor);
  }

  get(name: string): Motor | undefined {
    return this.motors.get(name);
  }

  has(name: string): boolean {
    return this.motors.has(name);
  }

  list(): Motor[] {
    return [...this.motors.values()];
  }

  /**
   * Action manifest, one line per motor in registration order.
   */
  manifest(): string {
    return this.list()
      .map((motor) => {
        const streamed = motor.acceptsBody ? ' (body is streamed)' : '';
        return `${renderMotorTag(motor)} — ${motor.description}${streamed}`;
      })
      .join('\n');
  }
}

export function createMotorRegistry(motors: readonly Motor[] = []): MotorRegistry {
  const registry = new MotorRegistry();
  for (const motor of motors) {
    registry.register(motor);
  }
  return registry;
}
