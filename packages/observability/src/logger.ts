export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
}

let sink: LogSink = consoleSink;

/** Route log entries somewhere other than stdout/stderr. Pass `null` to restore the console sink. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  sink({
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  });
}
