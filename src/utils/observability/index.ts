export type * from './types.js';

export {
  createRunId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
  isLevelEnabled,
  parseLogLevel,
  LOG_LEVELS,
} from './logger.js';
