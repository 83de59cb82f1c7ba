import type { OperationError } from "./errors.js";
import type { CacheOption } from "./cache.js";

/** 決定 renderer 顯示哪個分支 */
export type ViewState = "loading" | "ready" | "error";

/** 區分第一次載入與 refresh 用的次要狀態 */
export type ProcessState = "idle" | "processing" | "ready" | "error";

export type MaybePromise<T> = T | PromiseLike<T>;

// T 不含 null / undefined：成功的 operation 一定有值
export type AsyncOperation<T extends {}> = () => MaybePromise<T>;
export type SuccessCallback<T extends {}> = (value: T) => MaybePromise<T>;
export type ErrorCallback = (error: OperationError) => void;
export type DoneCallback = () => void;

/**
 * silent refresh（resetOnRun=false）失敗時的處理方式：
 * - keep-previous：保留舊資料，只記錄錯誤，view state 不變
 * - surface-error：清掉舊資料，view state 變成 error
 */
export type FailedRefreshPolicy = "keep-previous" | "surface-error";

export interface ControllerOptions<T extends {}> {
  resetOnRun?: boolean;
  onSuccess?: SuccessCallback<T>;
  onError?: ErrorCallback;
  onDone?: DoneCallback;
  cache?: CacheOption;
  failedRefresh?: FailedRefreshPolicy;
}

export interface RefreshOptions<T extends {}> {
  resetOnRun?: boolean;
  onSuccess?: SuccessCallback<T>;
  onError?: ErrorCallback;
  onDone?: DoneCallback;
  rethrowOnFailure?: boolean;
  useCache?: boolean;
}

export type RunOptions<T extends {}> = RefreshOptions<T>;

export interface UpdateOptions {
  deferNotification?: boolean;
}

export interface SetErrorOptions extends UpdateOptions {
  updateVisiblePhase?: boolean;
}

export interface ResetOptions {
  updateVisiblePhase?: boolean;
}

export interface WhenBranches<T, R> {
  ready: (data: T) => R;
  error: (error: OperationError) => R;
  loading: () => R;
}
