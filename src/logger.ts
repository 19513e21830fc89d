export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

/**
 * Scoped console logger. Every line is prefixed with `[scope]`; multi-line
 * messages keep the prefix on the first line only so diagrams stay aligned.
 */
export function createLogger(scope: string, sink: LogSink = console): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => sink.log(`${prefix} ${message}`),
    warn: (message) => sink.error(`${prefix} warning: ${message}`),
    error: (message) => sink.error(`${prefix} error: ${message}`),
    child: (child) => createLogger(`${scope}:${child}`, sink),
  };
}

/** Collects lines in memory; used by tests and for quiet runs. */
export function createMemorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
}
