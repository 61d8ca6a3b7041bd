import { config } from 'winston';

export const loggingConfig = {
  // npm levels: error, warn, info, http, verbose, debug, silly
  levels: config.npm.levels,

  // Level used when neither LOG_LEVEL nor NODE_ENV=test applies
  defaultLevel: 'warn',

  // Level used under NODE_ENV=test unless LOG_LEVEL is set
  testLevel: 'error',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss'
  },

  // Components that own a logger
  scopes: {
    grammar: { label: 'token-grammar' },
    writer: { label: 'map-writer' }
  }
} as const;

export type LogScope = keyof typeof loggingConfig.scopes;
