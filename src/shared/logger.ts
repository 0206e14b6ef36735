import pino, { type DestinationStream } from 'pino';
import pretty from 'pino-pretty';

/**
 * Structured Logger using Pino
 *
 * One JSON line per event, shared by every module of the slot run.
 *
 * **Configuration:**
 * - LOG_LEVEL: Start-up log level (error, warn, info, debug) - defaults to 'info'
 *   ('silent' under Jest unless LOG_LEVEL is set)
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON
 * - settings.log_level in the config file replaces the level once the config
 *   is loaded (see setLogLevel)
 * - settings.log_file adds a JSON log file next to the console output
 *   (see enableFileLogging)
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../../shared/logger';
 *
 * logger.warn({
 *   msg: 'Thumbnail upload failed',
 *   user: 'alice',
 *   slot: 2,
 *   error: error.message,
 * });
 * ```
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const isJest = process.env.JEST_WORKER_ID !== undefined;
const logLevel = process.env.LOG_LEVEL || (isJest ? 'silent' : 'info');

// pino-pretty only for local runs; cron and container runs keep JSON
const consoleStream: DestinationStream = isDevelopment
  ? pretty({
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    })
  : pino.destination(1);

// Level filtering happens on the logger; every stream takes what passes it
const streams = pino.multistream([{ level: 'trace', stream: consoleStream }]);

export const logger = pino(
  {
    level: logLevel,
    base: {
      service: 'memory-slot-notifier',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams
);

/**
 * Synchronous append-only destination for a log file; missing parent
 * directories are created.
 */
export function fileDestination(logFile: string): DestinationStream {
  return pino.destination({ dest: logFile, mkdir: true, sync: true });
}

/**
 * Sends every later log line to `logFile` as well as the console.
 */
export function enableFileLogging(logFile: string): void {
  streams.add({ level: 'trace', stream: fileDestination(logFile) });
  logger.debug({ msg: 'Logging to file', logFile });
}

/**
 * Applies the configured log level (case-insensitive). Unknown levels are
 * ignored with a warning so that a typo never aborts a run.
 */
export function setLogLevel(level: string): void {
  const normalized = level.trim().toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(logger.levels.values, normalized) && normalized !== 'silent') {
    logger.warn({ msg: 'Unknown log level in config, keeping current level', level, current: logger.level });
    return;
  }
  logger.level = normalized;
}
