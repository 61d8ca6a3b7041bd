import { createLogger as createWinstonLogger, format, transports } from 'winston';
import type { Logger } from 'winston';
import { loggingConfig, type LogScope } from './config/logging';

/**
 * Resolves the active log level from the environment.
 *
 * Order: `LOG_LEVEL`, then the test level under `NODE_ENV=test`, then the
 * configured default.
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env
): string {
  if (env.LOG_LEVEL && env.LOG_LEVEL in loggingConfig.levels) {
    return env.LOG_LEVEL;
  }

  if (env.NODE_ENV === 'test') {
    return loggingConfig.testLevel;
  }

  return loggingConfig.defaultLevel;
}

/**
 * Creates the winston logger of one component.
 *
 * Output is JSON on stderr, tagged with the component label so that messages
 * from the grammar and the writer can be told apart in the engine's log.
 */
export function createLogger(scope: LogScope): Logger {
  return createWinstonLogger({
    levels: loggingConfig.levels,
    level: resolveLogLevel(),
    format: format.combine(
      format.timestamp({ format: loggingConfig.format.timestamp }),
      format.json()
    ),
    defaultMeta: { scope: loggingConfig.scopes[scope].label },
    transports: [
      new transports.Console({
        stderrLevels: Object.keys(loggingConfig.levels)
      })
    ]
  });
}
