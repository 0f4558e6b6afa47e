export {
  LOG_LEVELS,
  compareLogLevels,
  isLevelEnabled,
  isLogLevel,
  logLevelToString,
  parseLogLevel,
} from './log-level.js';
export type { LogLevel } from './log-level.js';
