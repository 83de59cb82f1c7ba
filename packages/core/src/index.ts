export { Notifier } from "./notifier.js";
export type { Listener, NotifyOptions, Subscribable, Unsubscribe } from "./notifier.js";

export { signal } from "./signal.js";
export type { ReadonlySignal, Signal } from "./signal.js";

export { flushSync, scheduleJob } from "./scheduler.js";
export type { Schedulable } from "./scheduler.js";

export { describeError, log, setLogSink } from "./logging.js";
export type { LogEntry, LogLevel, LogRecord, LogSink } from "./logging.js";
