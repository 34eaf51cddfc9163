/**
 * Schemas for memory documents read back from storage.
 *
 * Entities are written with JSON.stringify (dates become ISO strings) and
 * parsed through these on load, so a hand-edited or truncated file is
 * rejected instead of leaking malformed records into the runtime.
 */

import { z } from 'zod';
import { IMPRESSION_LEVELS } from '../types/entities.js';

const timestamp = z.coerce.date();

const sensationSchema = z.object({
  type: z.literal('sensation'),
  id: z.string(),
  timestamp,
  kind: z.enum(['sensation', 'thought', 'feedback', 'outcome']),
  source: z.object({
    modality: z.string(),
    device: z.string().optional(),
  }),
  text: z.string(),
});

const impressionSchema = z.object({
  type: z.literal('impression'),
  id: z.string(),
  timestamp,
  level: z.enum(IMPRESSION_LEVELS),
  text: z.string(),
  producer: z.string(),
});

const intentionSchema = z.object({
  type: z.literal('intention'),
  id: z.string(),
  timestamp,
  action: z.string(),
  attributes: z.record(z.string()),
  body: z.string(),
});

const motorCallSchema = z.object({
  type: z.literal('motor_call'),
  id: z.string(),
  intentionId: z.string(),
  action: z.string(),
  startedAt: timestamp,
});

const completionSchema = z.object({
  type: z.literal('completion'),
  id: z.string(),
  motorCallId: z.string(),
  timestamp,
  result: z.string(),
});

const interruptionSchema = z.object({
  type: z.literal('interruption'),
  id: z.string(),
  motorCallId: z.string(),
  timestamp,
  cause: z.enum(['superseded', 'error', 'cancelled']),
  detail: z.string(),
});

const lifecycleSchema = z.object({
  type: z.literal('lifecycle'),
  id: z.string(),
  timestamp,
  unit: z.string(),
  event: z.enum(['started', 'stopped', 'crashed', 'restarted', 'terminated']),
  detail: z.string().optional(),
});

export const entitySchema = z.discriminatedUnion('type', [
  sensationSchema,
  impressionSchema,
  intentionSchema,
  motorCallSchema,
  completionSchema,
  interruptionSchema,
  lifecycleSchema,
]);

export const entityDocumentSchema = z.object({
  version: z.literal(1),
  entities: z.array(entitySchema),
});

export const edgeDocumentSchema = z.object({
  version: z.literal(1),
  edges: z.array(
    z.object({
      from: z.string(),
      relation: z.enum(['SUMMARIZES', 'FEEDBACK_OF', 'INVOKES', 'RESOLVES']),
      to: z.string(),
    })
  ),
});
