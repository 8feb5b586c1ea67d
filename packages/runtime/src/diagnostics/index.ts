export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  resolveLogger,
  type DiagnosticLogger,
  type EngineOptions,
  type LogEntry,
} from './logger.js';
