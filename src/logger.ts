import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  name?: string;
  // Defaults to stdout; the CLI passes stderr so JSON output stays clean
  destination?: DestinationStream;
}

/**
 * createLogger — builds a pino logger for the client and its strategies.
 *
 * Nothing in the library imports a shared logger instance; callers create one
 * here (or bring their own pino logger) and pass it in through the options.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config = {
    name: options.name ?? 'moneybird',
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}

// Used when no logger is supplied
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
