import type { Motor, MotorContext } from '../motor.js';
import type { Logger } from '../../types/logger.js';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Log: writes its body as a log line, the agent's way of leaving a note.
 */
export class LogMotor implements Motor {
  readonly name = 'log';
  readonly description = 'Write a note to the runtime log';
  readonly attributes = { required: [], optional: ['level'] };
  readonly acceptsBody = false;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'agent-log' });
  }

  perform({ intention }: MotorContext): Promise<string> {
    const requested = intention.attributes['level'];
    const level: LogLevel = isLogLevel(requested) ? requested : 'info';
    const text = intention.body.trim();
    const fields = { intentionId: intention.id };
    switch (level) {
      case 'debug':
        this.logger.debug(fields, text);
        break;
      case 'info':
        this.logger.info(fields, text);
        break;
      case 'warn':
        this.logger.warn(fields, text);
        break;
      case 'error':
        this.logger.error(fields, text);
        break;
    }
    return Promise.resolve(`Logged ${String(text.length)} characters at ${level}`);
  }
}
