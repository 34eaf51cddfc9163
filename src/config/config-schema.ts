import { z } from 'zod';
import { IMPRESSION_LEVELS } from '../types/entities.js';
import { TEMPLATE_FIELDS, unknownTemplateFields } from '../wit/prompt.js';

/**
 * Runtime configuration file schema.
 *
 * This is what gets loaded from data/config/runtime.json. Every field is
 * optional; parsing fills in the defaults below.
 */

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const levelSchema = z.enum(IMPRESSION_LEVELS);

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

const retrySchema = z
  .object({
    maxRetries: z.number().int().min(0).default(3),
    baseDelayMs: z.number().int().min(0).default(1_000),
    maxDelayMs: z.number().int().min(0).default(30_000),
    /** Per-attempt budget; 0 disables it */
    timeoutMs: z.number().int().min(0).default(120_000),
  })
  .default({});

export const distillerConfigSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'Distiller names are letters, digits, "_" and "-"'),
  level: levelSchema,
  instructions: z.string().min(1),
  /** User prompt layout with {{timeline}} and {{recalled}} placeholders */
  promptTemplate: z
    .string()
    .min(1)
    .refine((template) => unknownTemplateFields(template).length === 0, {
      message: `Template fields are ${TEMPLATE_FIELDS.map((field) => `{{${field}}}`).join(' and ')}`,
    })
    .optional(),
  /** Ingress paths whose sensations this distiller takes */
  paths: z.array(z.string()).default([]),
  /** Impression levels (from other distillers) this distiller takes */
  levels: z.array(levelSchema).default([]),
  batchSize: z.number().int().min(1).default(1),
  quiescenceMs: z.number().int().min(0).default(5_000),
  recall: z.object({ limit: z.number().int().min(1) }).optional(),
  /** Distiller that also receives every produced impression */
  feedback: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  retry: retrySchema,
});

export type DistillerFileConfig = z.output<typeof distillerConfigSchema>;

const DEFAULT_DISTILLERS: z.input<typeof distillerConfigSchema>[] = [
  {
    name: 'instant',
    level: 'instant',
    instructions:
      'You are the perception of an embodied agent. In one first-person sentence, say what is happening ' +
      'in the timeline below. Only use what is there; do not address anyone.',
    paths: ['/chat', '/heard', '/seen', '/sensor', '/source', '/recall'],
    batchSize: 1,
  },
  {
    name: 'situation',
    level: 'situation',
    instructions:
      'You are the situational awareness of an embodied agent. Combine the recent instants below into one ' +
      'first-person sentence describing the current situation. Stay with the facts given.',
    levels: ['instant'],
    batchSize: 3,
    quiescenceMs: 10_000,
    recall: { limit: 3 },
  },
  {
    name: 'episode',
    level: 'episode',
    instructions:
      'You keep the episodic memory of an embodied agent. Summarize the situations below as one short ' +
      'first-person paragraph about what happened.',
    levels: ['situation'],
    batchSize: 10,
    quiescenceMs: 120_000,
  },
];

const DEFAULT_WILL_INSTRUCTIONS =
  'You are the will of an embodied agent. Given what it currently perceives, decide what to do next ' +
  'by writing action tags. Act only when there is a reason to.';

export const runtimeConfigSchema = z.object({
  version: z.number().int().default(CONFIG_FILE_VERSION),

  logging: z
    .object({
      level: logLevelSchema.default('info'),
      pretty: z.boolean().default(true),
      logDir: z.string().default('data/logs'),
      maxFiles: z.number().int().min(1).default(10),
      /** Write prompts and responses to a separate transcript log */
      transcript: z.boolean().default(true),
    })
    .default({}),

  llm: z
    .object({
      openRouterApiKey: z.string().nullable().default(null),
      model: z.string().default('anthropic/claude-haiku-4.5'),
      /** OpenAI-compatible local server; used instead of OpenRouter when set */
      baseUrl: z.string().nullable().default(null),
    })
    .default({}),

  memory: z
    .object({
      /** best-effort: log failed writes and keep going; strict: fail the caller */
      durability: z.enum(['best-effort', 'strict']).default('best-effort'),
      flushIntervalMs: z.number().int().min(0).default(5_000),
    })
    .default({}),

  health: z
    .object({
      degradedThreshold: z.number().int().min(1).default(5),
    })
    .default({}),

  distillers: z.array(distillerConfigSchema).default(DEFAULT_DISTILLERS),

  will: z
    .object({
      enabled: z.boolean().default(true),
      level: levelSchema.default('situation'),
      instructions: z.string().min(1).default(DEFAULT_WILL_INSTRUCTIONS),
      minIntervalMs: z.number().int().min(0).default(60_000),
      recallLimit: z.number().int().min(0).default(3),
      recentActions: z.number().int().min(0).default(5),
      temperature: z.number().min(0).max(2).optional(),
      retry: retrySchema,
    })
    .default({}),

  motor: z
    .object({
      defaultTimeoutMs: z.number().int().min(1).default(30_000),
      /** 0 disables the limit */
      dispatchPerSecond: z.number().min(0).default(2),
      /** Root directory read_source may read from */
      sourceRoot: z.string().default('.'),
      speakTimeoutMs: z.number().int().min(1).default(120_000),
    })
    .default({}),

  supervisor: z
    .object({
      restartBackoffMs: z.number().int().min(0).default(1_000),
      maxRestartBackoffMs: z.number().int().min(0).default(30_000),
      shutdownTimeoutMs: z.number().int().min(0).default(5_000),
    })
    .default({}),

  ingress: z
    .object({
      /** Unix socket path; takes precedence over `port` */
      socketPath: z.string().nullable().default('data/run/ingress.sock'),
      port: z.number().int().min(0).max(65_535).nullable().default(null),
      host: z.string().default('127.0.0.1'),
      pipes: z
        .array(
          z.object({
            name: z.string(),
            socketPath: z.string(),
            path: z.string(),
            reconnectMs: z.number().int().min(0).default(1_000),
          })
        )
        .default([]),
    })
    .default({}),

  paths: z
    .object({
      data: z.string().default('data'),
      config: z.string().default('data/config'),
      state: z.string().default('data/state'),
    })
    .default({}),
});

export type RuntimeConfigFile = z.input<typeof runtimeConfigSchema>;

/**
 * Merged runtime configuration: defaults, then the config file, then
 * environment variables.
 */
export type RuntimeConfig = z.output<typeof runtimeConfigSchema>;

export const DEFAULT_CONFIG: RuntimeConfig = runtimeConfigSchema.parse({});
