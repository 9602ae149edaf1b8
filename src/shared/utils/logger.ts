/**
 * Structured JSON logger for Cloud Functions.
 *
 * Uses Pino for JSON logging that Cloud Logging ingests as structured entries.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @param destination - Optional stream to write to instead of stdout
 */
export function setupLogger(
  name: string = 'vm-scheduler',
  level?: string,
  destination?: pino.DestinationStream
): pino.Logger {
  const logLevel: LogLevel = toLogLevel(level?.toLowerCase() || process.env.LOG_LEVEL?.toLowerCase());

  const options: pino.LoggerOptions = {
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}

function toLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}
