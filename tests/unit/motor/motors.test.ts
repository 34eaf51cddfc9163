import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { MotorContext } from '../../../src/motor/motor.js';
import { ReadSourceMotor } from '../../../src/motor/motors/read-source.js';
import { RecallMotor } from '../../../src/motor/motors/recall.js';
import { LogMotor } from '../../../src/motor/motors/log.js';
import { createImpression, createIntention, createSensation } from '../../../src/types/entities.js';
import type { Sensation } from '../../../src/types/entities.js';
import { MotorError } from '../../../src/core/errors.js';
import { createMockLogger, createTestMemory } from '../../helpers/factories.js';

async function* noBody(): AsyncIterable<string> {
  // body already on the intention
}

function contextFor(action: string, attributes: Record<string, string>, body = ''): MotorContext {
  return {
    intention: createIntention(action, attributes, body),
    body: noBody(),
    signal: new AbortController().signal,
    logger: createMockLogger(),
  };
}

describe('ReadSourceMotor', () => {
  let root: string;
  let sensed: Sensation[];
  let motor: ReadSourceMotor;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'read-source-'));
    const lines = Array.from({ length: 25 }, (_, i) => `line ${String(i + 1)}`);
    await writeFile(join(root, 'a.txt'), lines.join('\n'));
    sensed = [];
    motor = new ReadSourceMotor(root, (sensation) => sensed.push(sensation));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('feeds one block of the file back as a source sensation', async () => {
    const result = await motor.perform(contextFor('read_source', { path: 'a.txt', block: '1' }));

    expect(result).toBe('Read block 1 of a.txt');
    expect(sensed).toHaveLength(1);
    expect(sensed[0]?.text).toBe('a.txt (block 2 of 2):\nline 21\nline 22\nline 23\nline 24\nline 25');
    expect(sensed[0]?.source).toEqual({ modality: 'source', device: 'read_source' });
    expect(sensed[0]?.kind).toBe('outcome');
  });

  it('clamps the block index and truncates to max_bytes', async () => {
    await motor.perform(contextFor('read_source', { path: 'a.txt', block: '9', max_bytes: '7' }));
    expect(sensed[0]?.text).toBe('a.txt (block 2 of 2):\nline 21');
  });

  it('refuses paths outside the source root', async () => {
    await expect(motor.perform(contextFor('read_source', { path: '../secret.txt' }))).rejects.toBeInstanceOf(
      MotorError
    );
    expect(sensed).toEqual([]);
  });
});

describe('RecallMotor', () => {
  it('feeds recalled impressions back as a sensation', async () => {
    const { memory } = createTestMemory();
    const source = createSensation('evening', { modality: 'chat' });
    await memory.insert(source);
    await memory.insert(createImpression('situation', 'I feel lonely tonight', 'situation'), { sources: [source.id] });
    const sensed: Sensation[] = [];
    const motor = new RecallMotor(memory, (sensation) => sensed.push(sensation));

    expect(await motor.perform(contextFor('recall', {}, ' lonely '))).toBe('Recalled 1 impression(s)');
    expect(sensed[0]?.text).toBe('I remember:\n- I feel lonely tonight');
    expect(sensed[0]?.source).toEqual({ modality: 'recall', device: 'recall' });
  });

  it('says so when nothing matches', async () => {
    const { memory } = createTestMemory();
    const sensed: Sensation[] = [];
    const motor = new RecallMotor(memory, (sensation) => sensed.push(sensation));

    expect(await motor.perform(contextFor('recall', { limit: '2' }, 'garden'))).toBe('Recalled 0 impression(s)');
    expect(sensed[0]?.text).toBe('I can\'t recall anything about "garden".');
  });
});

describe('LogMotor', () => {
  it('logs the body at the requested level', async () => {
    const logger = createMockLogger();
    const motor = new LogMotor(logger);

    expect(await motor.perform(contextFor('log', { level: 'warn' }, ' note '))).toBe('Logged 4 characters at warn');
    expect(logger.messages('warn')).toEqual(['note']);
  });

  it('falls back to info for an unknown level', async () => {
    const logger = createMockLogger();
    const motor = new LogMotor(logger);

    expect(await motor.perform(contextFor('log', { level: 'loud' }, 'hello'))).toBe('Logged 5 characters at info');
    expect(logger.messages('info')).toEqual(['hello']);
  });
});
