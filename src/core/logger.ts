import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(name: string = 'covenant', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'warn';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  // stderr keeps violation reports out of the host program's stdout
  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
