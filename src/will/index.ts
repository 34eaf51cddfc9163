export type { DecisionResult, WillConfig, WillDeps, WillResources } from './decision-engine.js';
export { DecisionEngine, createDecisionEngine } from './decision-engine.js';
export type { ParserState, StreamParserListener } from './stream-parser.js';
export { StreamParser, parseAttributes } from './stream-parser.js';
export type { DecisionSnapshot } from './snapshot.js';
export { SnapshotThrottle, canonicalJson, snapshotHash } from './snapshot.js';
export { THOUGHT_PREFIX, buildDecisionPrompt, describeOutcome } from './prompt.js';
