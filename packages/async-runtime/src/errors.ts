/**
 * 包住 operation 丟出的任意值。
 * cause 保留原始值（不一定是 Error），trace 只有在原始值是 Error 時才有。
 */
export class OperationError extends Error {
  readonly cause: unknown;
  readonly trace: string | undefined;

  constructor(cause: unknown, trace?: string) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = "OperationError";
    this.cause = cause;
    this.trace = trace ?? (cause instanceof Error ? cause.stack : undefined);
  }

  static from(err: unknown): OperationError {
    return err instanceof OperationError ? err : new OperationError(err);
  }
}
