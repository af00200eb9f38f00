import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File transport settings, used when a log file is configured
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  defaultLevel: 'error',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    accumulator: {
      level: 'error'
    },
    macro: {
      level: 'error',
      includeMetadata: true
    },
    rewrite: {
      level: 'error',
      includeMetadata: true
    },
    resolver: {
      level: 'error',
      includeMetadata: true
    },
    compiler: {
      level: 'error',
      includeMetadata: true
    },
    execution: {
      level: 'error',
      includeMetadata: true
    },
    meta: {
      level: 'error'
    },
    session: {
      level: 'error',
      includeMetadata: true
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type LogServiceName = keyof typeof loggingConfig.services;
