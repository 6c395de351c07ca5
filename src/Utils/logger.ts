import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:standard',
          },
        },
});

/**
 * Log de-dupe / rate limit
 *
 * A broker that stays down produces the same failure on every recovery tick. Callers that
 * summarise such streaks pass a stable key (e.g. "monitor:failed:<clientId>") and a window in ms;
 * the first call logs, later calls within the window are suppressed.
 */
const lastLogAtByKey = new Map<string, number>();
const shouldLog = (key: string, windowMs: number) => {
  const now = Date.now();
  const last = lastLogAtByKey.get(key);
  if (last !== undefined && now - last < windowMs) return false;
  lastLogAtByKey.set(key, now);
  return true;
};

// pino only serialises an error passed as the `err` field of the merge object.
export const logDebug = (message: string, error?: unknown) => {
  if (error === undefined) logger.debug(message);
  else logger.debug({ err: error }, message);
};
export const logInfo = (message: string, error?: unknown) => {
  if (error === undefined) logger.info(message);
  else logger.info({ err: error }, message);
};
export const logWarn = (message: string, error?: unknown) => {
  if (error === undefined) logger.warn(message);
  else logger.warn({ err: error }, message);
};
export const logError = (message: string, error?: unknown) => {
  if (error === undefined) logger.error(message);
  else logger.error({ err: error }, message);
};

export const logWarnDedup = (key: string, windowMs: number, message: string, error?: unknown) => {
  if (!shouldLog(key, windowMs)) return;
  logWarn(message, error);
};

export default logger;
