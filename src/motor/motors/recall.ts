import type { Motor, MotorContext, SensationSink } from '../motor.js';
import type { MemoryStore } from '../../memory/memory-store.js';
import { createSensation } from '../../types/entities.js';

const DEFAULT_LIMIT = 5;

/**
 * Recall: searches memory for impressions related to the body text and
 * feeds what it finds back as a sensation.
 */
export class RecallMotor implements Motor {
  readonly name = 'recall';
  readonly description = 'Search memory for impressions related to the body text';
  readonly attributes = { required: [], optional: ['limit'] };
  readonly acceptsBody = false;

  private readonly memory: MemoryStore;
  private readonly feedback: SensationSink;

  constructor(memory: MemoryStore, feedback: SensationSink) {
    this.memory = memory;
    this.feedback = feedback;
  }

  async perform({ intention }: MotorContext): Promise<string> {
    const query = intention.body.trim();
    const parsed = Number.parseInt(intention.attributes['limit'] ?? '', 10);
    const limit = Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_LIMIT;

    const hits = await this.memory.recall(query, limit);
    const text =
      hits.length > 0
        ? `I remember:\n${hits.map((hit) => `- ${hit.excerpt}`).join('\n')}`
        : `I can't recall anything about "${query}".`;
    this.feedback(createSensation(text, { modality: 'recall', device: this.name }, { kind: 'outcome' }));

    return `Recalled ${String(hits.length)} impression(s)`;
  }
}
