export {
  createComponentLogger,
  JsonLineLogger,
  noopLogger,
  type ComponentLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
