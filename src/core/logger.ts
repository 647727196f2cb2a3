import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

const DEFAULT_LEVEL: LogLevel = 'warn';

export function createLogger(name: string = 'agent-scaling', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? envLevel() ?? DEFAULT_LEVEL;

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

  return pino({ name, level }, pino.destination(2));
}

function envLevel(): LogLevel | undefined {
  const raw = process.env.AGENT_SCALING_LOG_LEVEL;
  switch (raw) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return raw;
    default:
      return undefined;
  }
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
