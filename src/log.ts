export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
}

/** Receives fully formatted log lines. */
export type LogSink = (line: string) => void;

// stdout belongs to command output
const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export function createLogger(
  level: LogLevel = 'warn',
  sink: LogSink = stderrSink,
  clock: () => Date = () => new Date(),
): Logger {
  if (level === 'silent') {
    return {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
    };
  }

  const threshold = ORDER[level];
  const write = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (ORDER[lvl] > threshold) return;
    sink(`${clock().toISOString()} ${lvl.toUpperCase()} ${msg}${fmtMeta(meta)}`);
  };

  return {
    error: (msg, meta) => write('error', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    debug: (msg, meta) => write('debug', msg, meta),
  };
}
