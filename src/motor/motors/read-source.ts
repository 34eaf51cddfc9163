import { readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import type { Motor, MotorContext, SensationSink } from '../motor.js';
import { createSensation } from '../../types/entities.js';
import { MotorError } from '../../core/errors.js';

const LINES_PER_BLOCK = 20;
const DEFAULT_MAX_BYTES = 4_096;

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Read source: reads one block of a file under the configured root and
 * feeds it back as a sensation, letting the agent look at its own code.
 */
export class ReadSourceMotor implements Motor {
  readonly name = 'read_source';
  readonly description = `Read a block of ${String(LINES_PER_BLOCK)} lines from a source file (block counts from 0)`;
  readonly attributes = { required: ['path'], optional: ['block', 'max_bytes'] };
  readonly acceptsBody = false;

  private readonly root: string;
  private readonly feedback: SensationSink;

  constructor(root: string, feedback: SensationSink) {
    this.root = root;
    this.feedback = feedback;
  }

  async perform({ intention, signal }: MotorContext): Promise<string> {
    const requested = intention.attributes['path'] ?? '';
    const fullPath = resolve(this.root, requested);
    const rel = relative(resolve(this.root), fullPath);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new MotorError(this.name, `Path "${requested}" is outside the source root`);
    }

    const content = await readFile(fullPath, { encoding: 'utf-8', signal });
    const lines = content.split('\n');
    const blocks = Math.max(1, Math.ceil(lines.length / LINES_PER_BLOCK));
    const index = Math.min(parseNonNegativeInt(intention.attributes['block'], 0), blocks - 1);
    const maxBytes = parseNonNegativeInt(intention.attributes['max_bytes'], DEFAULT_MAX_BYTES);

    let block = lines.slice(index * LINES_PER_BLOCK, (index + 1) * LINES_PER_BLOCK).join('\n');
    const bytes = Buffer.from(block, 'utf-8');
    if (bytes.length > maxBytes) {
      block = bytes.subarray(0, maxBytes).toString('utf-8');
    }

    this.feedback(
      createSensation(`${rel} (block ${String(index + 1)} of ${String(blocks)}):\n${block}`, {
        modality: 'source',
        device: this.name,
      }, { kind: 'outcome' })
    );
    return `Read block ${String(index)} of ${rel}`;
  }
}
