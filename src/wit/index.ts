export type { DistillerConfig, DistillerDeps, DistillerResources } from './distiller.js';
export { Distiller, createDistiller } from './distiller.js';
export { buildDistillationPrompt, formatTimestamp, renderRecalled, renderTimeline } from './prompt.js';
