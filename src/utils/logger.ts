import winston from 'winston';

/**
 * Winston-based process logger.
 * Uses the npm level set (`error` … `silly`); `LOG_LEVEL=silent` mutes every transport.
 */

const KNOWN_LEVELS = Object.keys(winston.config.npm.levels);

/**
 * Unified formatter that tags each entry with a timestamp and level.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf((info) => `[${info.timestamp}][${info.level}]${info.message}`),
);

/**
 * Maps a requested level onto one winston understands, falling back to `info`.
 */
export function resolveLogLevel(raw: string | undefined): { level: string; silent: boolean } {
  const requested = (raw ?? '').trim().toLowerCase();
  if (requested === 'silent' || requested === 'off' || requested === 'none') {
    return { level: 'error', silent: true };
  }
  if (requested === 'warning') return { level: 'warn', silent: false };
  if (requested === 'trace') return { level: 'silly', silent: false };
  if (KNOWN_LEVELS.includes(requested)) return { level: requested, silent: false };
  return { level: 'info', silent: false };
}

const initial = resolveLogLevel(process.env.LOG_LEVEL);

const logger = winston.createLogger({
  level: initial.level,
  silent: initial.silent,
  format: logFormat,
  transports: [new winston.transports.Console()],
});

/**
 * Adjusts the active log level at runtime (e.g. after configuration has been loaded).
 */
export function setLogLevel(raw: string | undefined): void {
  const resolved = resolveLogLevel(raw);
  logger.level = resolved.level;
  logger.silent = resolved.silent;
}

export default logger;
