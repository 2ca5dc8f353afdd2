import * as winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, namespace, ...meta }) => {
    const scope = namespace ? ` [${String(namespace)}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level}${scope}: ${String(message)}${metaStr}`;
  }),
);

const rootLogger = winston.createLogger({
  level,
  // 日誌一律寫到 stderr，stdout 留給統計摘要
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
    }),
  ],
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export type Logger = winston.Logger;

/**
 * 取得帶命名空間的 logger
 */
export function createLogger(namespace: string): Logger {
  return rootLogger.child({ namespace });
}
