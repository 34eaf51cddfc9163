/**
 * Local socket ingress.
 *
 * Listens on a Unix socket path (or a TCP port) and turns every framed
 * message into one sensation through the router. Runs as a supervised
 * unit: `run()` resolves when its signal aborts and the server is closed.
 */

import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { rm } from 'node:fs/promises';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../core/errors.js';
import { FrameDecoder } from './framing.js';
import type { Frame } from './framing.js';
import type { IngestResult } from './router.js';

export type IngressAddress = { socketPath: string } | { port: number; host?: string | undefined };

/** Receives decoded frames, in order per connection */
export type FrameHandler = (frame: Frame, device: string) => Promise<IngestResult>;

export function describeAddress(address: IngressAddress): string {
  return 'socketPath' in address ? address.socketPath : `${address.host ?? '127.0.0.1'}:${String(address.port)}`;
}

export class SocketIngress {
  private readonly address: IngressAddress;
  private readonly handler: FrameHandler;
  private readonly logger: Logger;
  private readonly sockets = new Set<Socket>();
  private server: Server | null = null;
  private connections = 0;

  constructor(address: IngressAddress, handler: FrameHandler, logger: Logger) {
    this.address = address;
    this.handler = handler;
    this.logger = logger.child({ component: 'ingress' });
  }

  /**
   * Bound port, for `{ port: 0 }` listeners.
   */
  port(): number | null {
    const bound = this.server?.address();
    return bound !== null && bound !== undefined && typeof bound === 'object' ? bound.port : null;
  }

  async listen(): Promise<void> {
    if (this.server) return;
    if ('socketPath' in this.address) {
      // Stale socket file from a previous run
      await rm(this.address.socketPath, { force: true });
    }

    const server = createServer((socket) => {
      this.accept(socket);
    });
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      const onListening = (): void => {
        server.off('error', reject);
        resolve();
      };
      if ('socketPath' in this.address) {
        server.listen(this.address.socketPath, onListening);
      } else {
        server.listen(this.address.port, this.address.host ?? '127.0.0.1', onListening);
      }
    });
    server.on('error', (error) => {
      this.logger.error({ error: errorMessage(error) }, 'Ingress server error');
    });
    this.server = server;
    this.logger.info({ address: describeAddress(this.address) }, 'Ingress listening');
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });
    if ('socketPath' in this.address) {
      await rm(this.address.socketPath, { force: true });
    }
    this.logger.info('Ingress closed');
  }

  /**
   * Unit body: listen until `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.listen();
    try {
      await new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener(
          'abort',
          () => {
            resolve();
          },
          { once: true }
        );
      });
    } finally {
      await this.close();
    }
  }

  private accept(socket: Socket): void {
    const device = `conn-${String(++this.connections)}`;
    const decoder = new FrameDecoder();
    let chain: Promise<void> = Promise.resolve();
    this.sockets.add(socket);
    this.logger.debug({ device }, 'Ingress connection opened');

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      for (const frame of decoder.push(chunk)) {
        chain = chain.then(() => this.deliver(frame, device));
      }
    });
    socket.on('error', (error) => {
      this.logger.warn({ device, error: errorMessage(error) }, 'Ingress connection error');
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
      if (decoder.hasPartial()) {
        this.logger.warn({ device }, 'Connection closed inside a frame, partial frame dropped');
      }
      this.logger.debug({ device }, 'Ingress connection closed');
    });
  }

  private async deliver(frame: Frame, device: string): Promise<void> {
    try {
      await this.handler(frame, device);
    } catch (error) {
      this.logger.error({ path: frame.path, device, error: errorMessage(error) }, 'Failed to ingest frame');
    }
  }
}

export function createSocketIngress(address: IngressAddress, handler: FrameHandler, logger: Logger): SocketIngress {
  return new SocketIngress(address, handler, logger);
}
