/**
 * Sensation router.
 *
 * Turns ingress frames into sensations and hands each one to the
 * distillers registered for its path. A route registered for "/chat"
 * also takes "/chat/anything". A frame is stored once and delivered to
 * every matching target; a duplicate (same source, text and second) is
 * stored nowhere and delivered nowhere.
 */

import type { Logger } from '../types/logger.js';
import type { Experience, Sensation } from '../types/entities.js';
import { createSensation } from '../types/entities.js';
import type { MemoryStore } from '../memory/memory-store.js';
import { pathModality } from './framing.js';

export interface RouteTarget {
  readonly name: string;
  enqueue(item: Experience): boolean;
}

export type IngestResult =
  | { status: 'routed'; sensation: Sensation; targets: string[] }
  | { status: 'duplicate'; id: string }
  | { status: 'unrouted'; path: string };

export interface IngestOptions {
  device?: string | undefined;
  timestamp?: Date | undefined;
}

function normalizePath(path: string): string {
  const trimmed = path.trim().replace(/\/+$/, '');
  if (trimmed.length === 0) return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export class SensationRouter {
  private readonly routes = new Map<string, RouteTarget[]>();
  private readonly memory: MemoryStore;
  private readonly logger: Logger;

  constructor(memory: MemoryStore, logger: Logger) {
    this.memory = memory;
    this.logger = logger.child({ component: 'router' });
  }

  addRoute(path: string, target: RouteTarget): void {
    const key = normalizePath(path);
    const targets = this.routes.get(key) ?? [];
    if (targets.some((t) => t.name === target.name)) {
      return;
    }
    targets.push(target);
    this.routes.set(key, targets);
    this.logger.debug({ path: key, target: target.name }, 'Route added');
  }

  /**
   * Targets for a path: the longest registered route that equals it or is
   * a segment prefix of it.
   */
  resolve(path: string): RouteTarget[] {
    let key = normalizePath(path);
    for (;;) {
      const targets = this.routes.get(key);
      if (targets && targets.length > 0) return targets;
      if (key === '/') return [];
      const cut = key.lastIndexOf('/');
      key = cut <= 0 ? '/' : key.slice(0, cut);
    }
  }

  paths(): string[] {
    return [...this.routes.keys()];
  }

  /**
   * Build a sensation for a frame on `path` and deliver it.
   */
  ingest(path: string, text: string, options: IngestOptions = {}): Promise<IngestResult> {
    const sensation = createSensation(
      text,
      { modality: pathModality(path), device: options.device },
      { timestamp: options.timestamp }
    );
    return this.deliver(sensation, path);
  }

  /**
   * Store a sensation and enqueue it to every target for `path` (by
   * default "/<modality>"). Used directly for what motors report back.
   */
  async deliver(sensation: Sensation, path = `/${sensation.source.modality}`): Promise<IngestResult> {
    const targets = this.resolve(path);
    if (targets.length === 0) {
      this.logger.warn({ path, length: sensation.text.length }, 'No route for path, sensation dropped');
      return { status: 'unrouted', path };
    }

    const { id, created } = await this.memory.insert(sensation);
    if (!created) {
      this.logger.debug({ path, id }, 'Duplicate sensation ignored');
      return { status: 'duplicate', id };
    }

    const delivered: string[] = [];
    for (const target of targets) {
      if (target.enqueue(sensation)) {
        delivered.push(target.name);
      } else {
        this.logger.warn({ path, target: target.name }, 'Target closed, sensation not delivered');
      }
    }
    this.logger.debug({ path, sensationId: sensation.id, targets: delivered }, 'Sensation routed');
    return { status: 'routed', sensation, targets: delivered };
  }
}

export function createSensationRouter(memory: MemoryStore, logger: Logger): SensationRouter {
  return new SensationRouter(memory, logger);
}
