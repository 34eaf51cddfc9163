export { FRAME_TERMINATOR, FrameDecoder, encodeFrame, pathModality } from './framing.js';
export type { Frame } from './framing.js';
export { SensationRouter, createSensationRouter } from './router.js';
export type { IngestOptions, IngestResult, RouteTarget } from './router.js';
export { SocketIngress, createSocketIngress, describeAddress } from './socket-ingress.js';
export type { FrameHandler, IngressAddress } from './socket-ingress.js';
export { PipeReader, createPipeReader } from './pipe-reader.js';
export type { LineHandler, PipeConfig } from './pipe-reader.js';
