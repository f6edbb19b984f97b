// Run logger: JSON lines to files, colorized single lines on the console

import { createLogger, format, transports, type Logger } from 'winston';

export type { Logger };

export interface RunLoggerOptions {
  level?: string;
  /** Extra log file, e.g. the path given with `-l` */
  logFile?: string;
  console?: boolean;
  colorize?: boolean;
  silent?: boolean;
}

const consoleFormat = (colorize: boolean) => format.combine(
  ...(colorize ? [format.colorize()] : []),
  format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
  })
);

export function fileTransport(filename: string): transports.FileTransportInstance {
  return new transports.File({
    filename,
    format: format.combine(format.timestamp(), format.json())
  });
}

export function createRunLogger(options: RunLoggerOptions = {}): Logger {
  const loggerTransports = [
    ...(options.console !== false
      ? [new transports.Console({ format: consoleFormat(options.colorize ?? true) })]
      : []),
    ...(options.logFile ? [fileTransport(options.logFile)] : [])
  ];

  return createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true })
    ),
    transports: loggerTransports
  });
}

/**
 * Logger that swallows everything; used by tests and library callers without
 * their own logging.
 */
export function createSilentLogger(): Logger {
  return createRunLogger({ silent: true, console: false });
}
