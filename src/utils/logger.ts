import pino from 'pino';
import type { AppConfig, LogLevel } from '../config/env';

// Level is set from config once it has been loaded.
const logger = pino({
  name: 'ai-gateway',
  level: 'info'
});

export function resolveLogLevel(config: Pick<AppConfig, 'LOG_LEVEL' | 'NODE_ENV'>): LogLevel {
  if (config.LOG_LEVEL) {
    return config.LOG_LEVEL;
  }
  return config.NODE_ENV === 'test' ? 'silent' : 'info';
}

export default logger;
