export {
  formatLabel,
  getLogger,
  getLoggerTransports,
  setLoggerTransports,
  type Logger,
  type TransportMode,
} from './pino-logger.js';
export { logLevels, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
