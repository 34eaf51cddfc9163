import type { Motor, MotorContext } from '../motor.js';
import type { Logger } from '../../types/logger.js';

/**
 * Where spoken text goes. Real synthesizer back ends live outside the
 * runtime and implement this.
 */
export interface SpeechSink {
  /** Speak one piece of text; resolves once it has been voiced */
  say(text: string, signal: AbortSignal): Promise<void>;
}

/**
 * Sink that only logs what would have been said.
 */
export function createLogSpeechSink(logger: Logger): SpeechSink {
  const log = logger.child({ component: 'speech' });
  return {
    say(text) {
      log.info({ text }, 'Speaking');
      return Promise.resolve();
    },
  };
}

const SENTENCE_END = /[.!?…]\s|\n/;

/**
 * Speak: streams its body to the speech sink sentence by sentence, so
 * speech starts before the model has finished the utterance.
 */
export class SpeakMotor implements Motor {
  readonly name = 'speak';
  readonly description = 'Say something out loud to whoever is present';
  readonly attributes = { required: [], optional: [] };
  readonly acceptsBody = true;
  readonly exclusive = 'voice';
  readonly timeoutMs: number | undefined;

  private readonly sink: SpeechSink;

  constructor(sink: SpeechSink, options: { timeoutMs?: number | undefined } = {}) {
    this.sink = sink;
    this.timeoutMs = options.timeoutMs;
  }

  async perform({ body, signal }: MotorContext): Promise<string> {
    let pending = '';
    let spoken = '';

    const flush = async (text: string): Promise<void> => {
      const trimmed = text.trim();
      if (trimmed.length === 0) return;
      await this.sink.say(trimmed, signal);
      spoken += spoken ? ` ${trimmed}` : trimmed;
    };

    for await (const chunk of body) {
      pending += chunk;
      let match = SENTENCE_END.exec(pending);
      while (match) {
        const cut = match.index + match[0].length;
        await flush(pending.slice(0, cut));
        pending = pending.slice(cut);
        match = SENTENCE_END.exec(pending);
      }
    }
    signal.throwIfAborted();
    await flush(pending);

    return spoken ? `Said: ${spoken}` : 'Nothing to say';
  }
}
