/**
 * Outbound pipe reader.
 *
 * Connects to an external line-oriented socket (a transcriber, a sensor
 * bridge) and forwards every non-empty line as a sensation on a fixed path.
 * A refused or dropped connection is retried after `reconnectMs`.
 */

import { createConnection } from 'node:net';
import type { Socket } from 'node:net';
import { createInterface } from 'node:readline';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../core/errors.js';
import { sleep } from '../core/retry.js';
import type { IngestResult } from './router.js';

export interface PipeConfig {
  /** Name used as the sensation's device */
  name: string;
  /** Socket to read from */
  socketPath: string;
  /** Pipeline path each line is delivered to */
  path: string;
  reconnectMs: number;
}

export type LineHandler = (path: string, text: string, device: string) => Promise<IngestResult>;

export class PipeReader {
  private readonly config: PipeConfig;
  private readonly handler: LineHandler;
  private readonly logger: Logger;

  constructor(config: PipeConfig, handler: LineHandler, logger: Logger) {
    this.config = config;
    this.handler = handler;
    this.logger = logger.child({ component: 'pipe', pipe: config.name });
  }

  /**
   * Unit body: read, reconnect, repeat until `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.readOnce(signal);
      } catch (error) {
        this.logger.debug({ socket: this.config.socketPath, error: errorMessage(error) }, 'Pipe connection failed');
      }
      if (signal.aborted) return;
      try {
        await sleep(this.config.reconnectMs, signal);
      } catch {
        return;
      }
    }
  }

  /**
   * One connection: resolves when the peer closes it or `signal` aborts.
   */
  async readOnce(signal: AbortSignal): Promise<void> {
    const socket = await this.connect();
    const onAbort = (): void => {
      socket.destroy();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    this.logger.info({ socket: this.config.socketPath }, 'Pipe connected');

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        const text = line.trimEnd();
        if (text.length === 0) continue;
        await this.forward(text);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      lines.close();
      socket.destroy();
      this.logger.info({ socket: this.config.socketPath }, 'Pipe disconnected');
    }
  }

  private connect(): Promise<Socket> {
    return new Promise<Socket>((resolve, reject) => {
      const socket = createConnection(this.config.socketPath);
      socket.setEncoding('utf8');
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        socket.on('error', (error) => {
          this.logger.debug({ error: errorMessage(error) }, 'Pipe read error');
        });
        resolve(socket);
      });
    });
  }

  private async forward(text: string): Promise<void> {
    try {
      await this.handler(this.config.path, text, this.config.name);
    } catch (error) {
      this.logger.error({ path: this.config.path, error: errorMessage(error) }, 'Failed to ingest pipe line');
    }
  }
}

export function createPipeReader(config: PipeConfig, handler: LineHandler, logger: Logger): PipeReader {
  return new PipeReader(config, handler, logger);
}
