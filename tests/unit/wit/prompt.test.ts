import { describe, it, expect } from 'vitest';
import {
  buildDistillationPrompt,
  formatTimestamp,
  renderTemplate,
  renderTimeline,
  unknownTemplateFields,
} from '../../../src/wit/prompt.js';
import { createImpression, createSensation } from '../../../src/types/entities.js';
import { ConfigError } from '../../../src/core/errors.js';

const at = (second: number): Date => new Date(Date.UTC(2026, 2, 1, 12, 0, second));

describe('formatTimestamp', () => {
  it('renders UTC without the T and milliseconds', () => {
    expect(formatTimestamp(new Date('2026-03-01T09:05:07.250Z'))).toBe('2026-03-01 09:05:07');
  });
});

describe('renderTimeline', () => {
  it('sorts by time and labels impressions by level', () => {
    const later = createSensation('Is anyone there?', { modality: 'heard' }, { timestamp: at(9) });
    const earlier = createImpression('instant', 'Someone knocked', 'instant', at(3));

    expect(renderTimeline([later, earlier])).toBe(
      '2026-03-01 12:00:03 impression.instant "Someone knocked"\n2026-03-01 12:00:09 heard "Is anyone there?"'
    );
  });

  it('drops a line that repeats the one before it', () => {
    const items = [
      createSensation('hello ', { modality: 'chat' }, { timestamp: at(0) }),
      createSensation('hello', { modality: 'chat' }, { timestamp: at(1) }),
      createSensation('hello', { modality: 'heard' }, { timestamp: at(2) }),
      createSensation('hello', { modality: 'chat' }, { timestamp: at(3) }),
    ];

    expect(renderTimeline(items)).toBe(
      [
        '2026-03-01 12:00:00 chat "hello"',
        '2026-03-01 12:00:02 heard "hello"',
        '2026-03-01 12:00:03 chat "hello"',
      ].join('\n')
    );
  });
});

describe('buildDistillationPrompt', () => {
  it('omits the memory section when nothing was recalled', () => {
    const item = createSensation('hi', { modality: 'chat' }, { timestamp: at(0) });
    expect(buildDistillationPrompt([item], [])).toBe('Timeline:\n2026-03-01 12:00:00 chat "hi"');
  });
});

describe('renderTemplate', () => {
  it('fills each placeholder, spaces inside the braces allowed', () => {
    expect(renderTemplate('Now:\n{{timeline}}\nBefore: {{ recalled }}', { timeline: 'T', recalled: 'R' })).toBe(
      'Now:\nT\nBefore: R'
    );
  });

  it('rejects a field it has no value for', () => {
    expect(unknownTemplateFields('{{timeline}} {{mood}} {{mood}}')).toEqual(['mood']);
    expect(() => renderTemplate('{{mood}}', { timeline: '', recalled: '' })).toThrow(ConfigError);
    expect(() => renderTemplate('{{mood}}', { timeline: '', recalled: '' })).toThrow('Unknown template field(s): mood');
  });

  it('lays out a distillation prompt from a template', () => {
    const item = createSensation('hi', { modality: 'chat' }, { timestamp: at(0) });
    expect(buildDistillationPrompt([item], [], 'What happened:\n{{timeline}}\n[{{recalled}}]')).toBe(
      'What happened:\n2026-03-01 12:00:00 chat "hi"\n[]'
    );
  });
});
