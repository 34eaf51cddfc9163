import type { Experience } from '../types/entities.js';
import type { RecallHit } from '../memory/memory-store.js';
import { ConfigError } from '../core/errors.js';

/**
 * Fields a distiller's prompt template may use, as `{{timeline}}`.
 */
export const TEMPLATE_FIELDS = ['timeline', 'recalled'] as const;

export type TemplateField = (typeof TEMPLATE_FIELDS)[number];

const FIELD = /\{\{\s*([a-zA-Z_]+)\s*\}\}/g;

/**
 * `2024-02-03 12:34:56` in UTC.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function label(item: Experience): string {
  return item.type === 'sensation' ? item.source.modality : `impression.${item.level}`;
}

/**
 * Render buffered items as a timeline, one line each:
 * `2024-02-03 12:34:56 chat "I feel lonely"`.
 *
 * Items are ordered by time; a line that repeats the one before it
 * (same label, same text) is dropped.
 */
export function renderTimeline(items: readonly Experience[]): string {
  const sorted = [...items].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const lines: string[] = [];
  let previous: { label: string; text: string } | null = null;
  for (const item of sorted) {
    const current = { label: label(item), text: item.text.trim() };
    if (previous && previous.label === current.label && previous.text === current.text) {
      continue;
    }
    lines.push(`${formatTimestamp(item.timestamp)} ${current.label} "${current.text}"`);
    previous = current;
  }
  return lines.join('\n');
}

export function renderRecalled(hits: readonly RecallHit[]): string {
  return hits.map((hit) => `- [${hit.impression.level}] ${hit.excerpt}`).join('\n');
}

/**
 * Field names a template uses that are not in TEMPLATE_FIELDS.
 */
export function unknownTemplateFields(template: string): string[] {
  const known = new Set<string>(TEMPLATE_FIELDS);
  const unknown = [...template.matchAll(FIELD)].map((match) => match[1] ?? '').filter((name) => !known.has(name));
  return [...new Set(unknown)];
}

/**
 * Substitute `{{field}}` placeholders. Throws on a field with no value.
 */
export function renderTemplate(template: string, values: Readonly<Record<TemplateField, string>>): string {
  const unknown = unknownTemplateFields(template);
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown template field(s): ${unknown.join(', ')}`);
  }
  const lookup = new Map<string, string>(Object.entries(values));
  return template.replace(FIELD, (match: string, name: string) => lookup.get(name) ?? match);
}

/**
 * Distillation prompt: recalled impressions (when any) then the timeline,
 * or the distiller's own template filled with both.
 */
export function buildDistillationPrompt(
  items: readonly Experience[],
  recalled: readonly RecallHit[],
  template?: string
): string {
  if (template !== undefined) {
    return renderTemplate(template, { timeline: renderTimeline(items), recalled: renderRecalled(recalled) });
  }
  const sections: string[] = [];
  if (recalled.length > 0) {
    sections.push(`Related impressions from memory:\n${renderRecalled(recalled)}`);
  }
  sections.push(`Timeline:\n${renderTimeline(items)}`);
  return sections.join('\n\n');
}
