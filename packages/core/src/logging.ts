export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  type: string;
  level: LogLevel;
  [key: string]: unknown;
}

export type LogRecord = LogEntry & { timestamp: string };

export type LogSink = (record: LogRecord) => void;

/** 預設 sink：一行一筆 JSON 寫到 stdout */
const consoleSink: LogSink = (record) => {
  console.log(JSON.stringify(record));
};

let sink: LogSink = consoleSink;

export function log(entry: LogEntry): void {
  sink({ ...entry, timestamp: new Date().toISOString() });
}

/**
 * 換掉輸出目的地，回傳舊的 sink 方便還原。
 * 不帶參數時回到預設的 console sink。
 */
export function setLogSink(next?: LogSink): LogSink {
  const prev = sink;
  sink = next ?? consoleSink;
  return prev;
}

export function describeError(err: unknown): { name: string; message: string; stack?: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { name: typeof err, message: String(err) };
}
