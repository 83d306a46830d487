export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export type LogLevel = 'info' | 'warn' | 'debug';

export type LogSink = (level: LogLevel, message: string) => void;

const consoleSink: LogSink = (level, message) => {
  if (level === 'warn') {
    console.warn(`[gwt] ${message}`);
  } else {
    console.error(`[gwt] ${message}`);
  }
};

export function createLogger(opts?: { debug?: boolean; sink?: LogSink }): Logger {
  const sink = opts?.sink ?? consoleSink;
  return {
    info: (message) => sink('info', message),
    warn: (message) => sink('warn', message),
    debug: (message) => {
      if (opts?.debug) sink('debug', message);
    },
  };
}

/**
 * Sink that keeps lines in memory so a tool can hand them back as output.
 */
export function createBufferSink(lines: string[]): LogSink {
  return (level, message) => {
    lines.push(level === 'warn' ? `warning: ${message}` : message);
  };
}
