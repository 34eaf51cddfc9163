export type { Motor, MotorAttributeSchema, MotorContext, SensationSink } from './motor.js';
export { MotorRegistry, createMotorRegistry, renderMotorTag } from './motor.js';
export type { BodyStream, ExecutionResult, MotorExecutorConfig } from './motor-executor.js';
export { MotorExecutor, createMotorExecutor } from './motor-executor.js';
export type { SpeechSink } from './motors/speak.js';
export { SpeakMotor, createLogSpeechSink } from './motors/speak.js';
export { LogMotor } from './motors/log.js';
export { ReadSourceMotor } from './motors/read-source.js';
export { RecallMotor } from './motors/recall.js';
