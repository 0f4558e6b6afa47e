export { JsonLineLogger, noopLogger } from './structured-logger.js';
export type {
  DiagnosticLevel,
  StructuredLogEvent,
  StructuredLogger,
  WritableTarget,
} from './structured-logger.js';
