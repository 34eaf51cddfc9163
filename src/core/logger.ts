import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { z } from 'zod';
import { getCycleContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep per prefix */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

function timestampedFilename(prefix: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${prefix}-${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest `maxFiles` for a prefix.
 */
function rotateLogs(logDir: string, prefix: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(`${prefix}-`) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch {
      // Another process may have removed it already
    }
  }
}

/**
 * Pino mixin that stamps unit / cycleId / causeId from the current cycle context.
 * Explicit fields passed to a log call win over these.
 */
function cycleMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getCycleContext();
    if (!ctx) return {};
    const result: Record<string, unknown> = { unit: ctx.unit, cycleId: ctx.cycleId };
    if (ctx.causeId) {
      result['causeId'] = ctx.causeId;
    }
    return result;
  };
}

/**
 * Create the runtime logger.
 *
 * Console output goes through pino-pretty in development (plain JSON to stdout
 * otherwise); a plain-text copy is written to a timestamped file in `logDir`.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  fs.mkdirSync(logDir, { recursive: true });
  rotateLogs(logDir, 'runtime', maxFiles);

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } },
    {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, timestampedFilename('runtime')),
        mkdir: true,
        colorize: false,
      },
    },
  ];

  return pino({
    level,
    transport: { targets },
    mixin: cycleMixin(),
  });
}

const transcriptLineSchema = z.object({
  msg: z.string().optional(),
  time: z.number().optional(),
  cycleId: z.string().optional(),
});

/**
 * Create the model transcript logger.
 *
 * Prompts and full responses are long; they go to their own file as
 * `[HH:mm:ss.mmm] [cycleId] message` lines instead of the main log.
 */
export function createTranscriptLogger(
  logDir = DEFAULT_CONFIG.logDir,
  level: pino.Level = 'info'
): pino.Logger {
  fs.mkdirSync(logDir, { recursive: true });
  rotateLogs(logDir, 'transcript', DEFAULT_CONFIG.maxFiles);

  const stream = fs.createWriteStream(path.join(logDir, timestampedFilename('transcript')), {
    flags: 'a',
  });

  const destination = {
    write(chunk: string): void {
      let raw: unknown;
      try {
        raw = JSON.parse(chunk);
      } catch {
        stream.write(chunk);
        return;
      }
      const parsed = transcriptLineSchema.safeParse(raw);
      if (!parsed.success || !parsed.data.msg) return;
      const { msg, time, cycleId } = parsed.data;
      const stamp = time ? new Date(time).toISOString().slice(11, 23) : '';
      const cycle = cycleId ? `[${cycleId}] ` : '';
      stream.write(`[${stamp}] ${cycle}${msg}\n`);
    },
  };

  return pino({ level, mixin: cycleMixin() }, destination);
}

let transcriptLogger: pino.Logger | null = null;

/**
 * Install the process-wide transcript logger (done by the container).
 */
export function setTranscriptLogger(logger: pino.Logger | null): void {
  transcriptLogger = logger;
}

/**
 * Write to the transcript log. No-op until a transcript logger is installed.
 */
export function logTranscript(obj: Record<string, unknown>, msg: string): void {
  transcriptLogger?.info(obj, msg);
}
