export {
  LOG_LEVEL_ENV_VAR,
  LOG_PATH_ENV_VAR,
  SessionLogger,
  type SessionLoggerOptions,
} from './session-logger.js';
