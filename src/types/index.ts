/**
 * Core type definitions.
 */

export type * from './entities.js';
export type * from './logger.js';

export {
  IMPRESSION_LEVELS,
  compareLevels,
  createSensation,
  createImpression,
  createIntention,
  createLifecycle,
} from './entities.js';
