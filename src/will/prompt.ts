import type { Impression } from '../types/entities.js';
import type { ExecutionResult } from '../motor/motor-executor.js';

export const THOUGHT_PREFIX = 'I thought to myself: ';

export function describeOutcome({ intention, outcome }: ExecutionResult): string {
  if (outcome.type === 'completion') {
    return `- ${intention.action}: completed (${outcome.result})`;
  }
  return `- ${intention.action}: interrupted, ${outcome.cause} (${outcome.detail})`;
}

export interface DecisionPromptInput {
  impression: Impression;
  /** Latest impression at each other level */
  context: readonly Impression[];
  recalled: readonly string[];
  recent: readonly ExecutionResult[];
  manifest: string;
}

export function buildDecisionPrompt(input: DecisionPromptInput): string {
  const sections = [`Current impression (${input.impression.level}):\n${input.impression.text}`];

  if (input.context.length > 0) {
    sections.push(
      `Other recent impressions:\n${input.context.map((i) => `- [${i.level}] ${i.text}`).join('\n')}`
    );
  }
  if (input.recalled.length > 0) {
    sections.push(`Related memories:\n${input.recalled.map((text) => `- ${text}`).join('\n')}`);
  }
  if (input.recent.length > 0) {
    sections.push(`Recent actions:\n${input.recent.map(describeOutcome).join('\n')}`);
  }
  sections.push(`Available actions:\n${input.manifest}`);
  sections.push(
    'Reply with one or more action tags from the list above, in the order they should happen. ' +
      'Text outside tags is your private thought and is not acted on.'
  );
  return sections.join('\n\n');
}
