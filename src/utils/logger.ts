import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO] ',
  [LogLevel.WARN]: '[WARN] ',
  [LogLevel.ERROR]: '[ERROR]'
};

export type LogSink = (line: string) => void;

// stdout carries command output (`depcache fingerprint | ...`), so diagnostics never go there
const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled logger writing one timestamped entry per call, structured meta as indented JSON
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink,
    private readonly clock: () => Date = () => new Date()
  ) {}

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) {
      return;
    }

    let line = `${this.clock().toISOString()} ${PREFIXES[level]} ${message}`;
    if (meta && typeof meta === 'object') {
      line += `\n${JSON.stringify(meta, errorReplacer, 2)}`;
    } else if (meta !== undefined) {
      line += ` ${String(meta)}`;
    }
    this.sink(line);
  }
}

// JSON.stringify(new Error()) is {}, so errors nested anywhere in meta are expanded here
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  return value;
}

/**
 * DEPCACHE_VERBOSE=1 wins, then DEPCACHE_LOG_LEVEL; otherwise only errors (info under NODE_ENV=development)
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  const requested = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  const named = LEVEL_ORDER.find(level => level === requested);
  if (named) {
    return named;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(resolveLogLevel(process.env));
