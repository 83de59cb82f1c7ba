import { Notifier, log, signal, type ReadonlySignal, type Signal } from "@notifier-kit/core";
import { NO_CACHE, isCacheFresh, type CacheOption } from "./cache.js";
import { OperationError } from "./errors.js";
import type {
  AsyncOperation,
  ControllerOptions,
  FailedRefreshPolicy,
  MaybePromise,
  ProcessState,
  RefreshOptions,
  ResetOptions,
  RunOptions,
  SetErrorOptions,
  UpdateOptions,
  ViewState,
  WhenBranches,
} from "./types.js";

export interface ControllerDefaults {
  resetOnRun: boolean;
  cache: CacheOption;
  failedRefresh: FailedRefreshPolicy;
}

export const DEFAULT_CONTROLLER_OPTIONS: Readonly<ControllerDefaults> = Object.freeze({
  resetOnRun: true,
  cache: NO_CACHE,
  failedRefresh: "keep-previous",
});

/**
 * 包住一個 async operation 與 change notification。
 *
 * const users = new AsyncResourceController<User[]>({ resetOnRun: false });
 * users.subscribe(() => render(users.when({ ready, error, loading })));
 * await users.runOperation(() => api.listUsers());
 * await users.refresh(); // 不會閃回 loading
 *
 * 狀態只在這裡同步修改，通知才有可能延到下一個 microtask。
 * 沒有 generation counter：重疊的 run 最後寫入的贏。
 */
export class AsyncResourceController<T extends {}> extends Notifier {
  readonly processState: ReadonlySignal<ProcessState>;

  private readonly options: ControllerOptions<T>;
  private readonly cacheOption: CacheOption;
  private readonly failedRefresh: FailedRefreshPolicy;
  private readonly process: Signal<ProcessState>;

  private currentData: T | undefined;
  private currentError: OperationError | undefined;
  private currentViewState: ViewState = "loading";
  private operation: AsyncOperation<T> | undefined;
  private inFlight: Promise<T> | undefined;
  private cachedAt: number | undefined;

  constructor(options: ControllerOptions<T> = {}) {
    super();
    this.options = options;
    this.cacheOption = options.cache ?? DEFAULT_CONTROLLER_OPTIONS.cache;
    this.failedRefresh = options.failedRefresh ?? DEFAULT_CONTROLLER_OPTIONS.failedRefresh;
    // 相同值也要通知，listener 才看得到連續兩次 processing
    this.process = signal<ProcessState>("idle", () => false);
    this.processState = { get: this.process.get, subscribe: this.process.subscribe };
  }

  get data() {
    return this.currentData;
  }

  get error() {
    return this.currentError;
  }

  get viewState() {
    return this.currentViewState;
  }

  /** 最近一次 operation 回傳的 Promise */
  get future() {
    return this.inFlight;
  }

  get hasData() {
    return this.currentData !== undefined;
  }

  get hasError() {
    return this.currentError !== undefined;
  }

  get hasDataOrError() {
    return this.hasData || this.hasError;
  }

  get isRefreshing() {
    return this.hasDataOrError && this.process.get() === "processing";
  }

  runOperation(operation: AsyncOperation<T>, options: RunOptions<T> = {}): Promise<T | undefined> {
    if (this.disposed) return Promise.resolve(undefined);
    this.operation = operation;
    return this.execute(operation, options, true);
  }

  /**
   * 重跑最後一次 runOperation 的 operation。
   * 沒帶的選項回到 constructor 的設定，不沿用上一次 run 的。
   */
  refresh(options: RefreshOptions<T> = {}): Promise<T | undefined> {
    if (this.disposed) return Promise.resolve(undefined);
    if (!this.operation) {
      log({
        type: "refresh_without_operation",
        level: "warn",
        message: "refresh() depends on runOperation(); call runOperation() once first",
      });
      return Promise.resolve(undefined);
    }
    return this.execute(this.operation, options, false);
  }

  private async execute(
    operation: AsyncOperation<T>,
    options: RefreshOptions<T>,
    useCacheByDefault: boolean
  ): Promise<T | undefined> {
    const resetOnRun = options.resetOnRun ?? this.options.resetOnRun ?? DEFAULT_CONTROLLER_OPTIONS.resetOnRun;
    const onSuccess = options.onSuccess ?? this.options.onSuccess;
    const onError = options.onError ?? this.options.onError;
    const onDone = options.onDone ?? this.options.onDone;

    if ((options.useCache ?? useCacheByDefault) && this.hasData && isCacheFresh(this.cacheOption, this.cachedAt)) {
      return this.currentData;
    }

    // 已經有資料或錯誤時，silent refresh 失敗不翻 view state
    const surfaceError =
      !this.hasDataOrError || resetOnRun || this.failedRefresh === "surface-error";

    try {
      this.reset({ updateVisiblePhase: resetOnRun });
      // 同步 throw 也會變成 rejection
      const future = new Promise<T>((resolve) => resolve(operation()));
      this.inFlight = future;
      return await future
        .then((value) => (onSuccess ? onSuccess(value) : value))
        .then((value) => {
          this.updateData(value);
          return value;
        });
    } catch (err) {
      const error = new OperationError(err);
      this.setError(error, { updateVisiblePhase: surfaceError });
      onError?.(error);
      if (options.rethrowOnFailure) {
        throw err;
      }
      return undefined;
    } finally {
      onDone?.();
    }
  }

  /** 帶入目前資料計算新值；回傳 null / undefined 時忽略 */
  modify(
    transform: (current: T | undefined) => MaybePromise<T | null | undefined>
  ): Promise<T | undefined> {
    if (this.disposed) return Promise.resolve(undefined);
    return new Promise<T | null | undefined>((resolve) => resolve(transform(this.currentData))).then(
      (next) => this.updateData(next)
    );
  }

  /**
   * 寫入資料並切到 ready；data 為 null / undefined 時忽略。
   * 要回到 loading 請用 reset。
   */
  updateData(data: T | null | undefined, options: UpdateOptions = {}): T | undefined {
    if (this.disposed || data === undefined || data === null) return undefined;
    const deferred = options.deferNotification ?? false;

    this.currentData = data;
    this.currentError = undefined;
    this.process.set("ready", { deferred });
    this.currentViewState = "ready";
    this.notify({ deferred });

    if (this.cacheOption.enabled) {
      this.cachedAt = Date.now();
    }
    return data;
  }

  /**
   * updateVisiblePhase=false 時只記錄錯誤，畫面維持原本的分支
   * （例如分頁載入失敗但列表要繼續顯示）。
   */
  setError(err: unknown, options: SetErrorOptions = {}) {
    if (this.disposed) return;
    const { updateVisiblePhase = true, deferNotification = false } = options;

    this.currentError = OperationError.from(err);
    if (updateVisiblePhase) {
      this.currentData = undefined;
      this.currentViewState = "error";
    }
    this.process.set("error", { deferred: deferNotification });
    this.notify({ deferred: deferNotification });
  }

  /** view state 已經是 error 時不動作 */
  clearError() {
    if (this.disposed || this.currentViewState === "error") return;
    this.currentError = undefined;
    this.notify();
  }

  /**
   * updateVisiblePhase=true：清掉資料與錯誤並回到 loading。
   * false：什麼都不清，只通知並把 process state 設成 processing。
   * 通知一律延到下一個 microtask。
   */
  reset(options: ResetOptions = {}) {
    if (this.disposed) return;
    const { updateVisiblePhase = true } = options;

    if (updateVisiblePhase) {
      this.currentData = undefined;
      this.currentError = undefined;
      this.currentViewState = "loading";
    }
    this.process.set("processing", { deferred: true });
    this.notify({ deferred: true });
  }

  when<R>(branches: WhenBranches<T, R>): R {
    if (this.currentData !== undefined) return branches.ready(this.currentData);
    if (this.currentError !== undefined) return branches.error(this.currentError);
    return branches.loading();
  }

  toString() {
    let content =
      `Data: ${String(this.currentData)}, Error: ${this.currentError?.message ?? "undefined"}, ` +
      `ViewState: ${this.currentViewState}, ProcessState: ${this.process.get()}`;
    if (this.cachedAt !== undefined) {
      content += `, CachedAt: ${new Date(this.cachedAt).toISOString()}`;
    }
    return content;
  }

  dispose() {
    if (this.disposed) return;
    this.currentData = undefined;
    this.currentError = undefined;
    this.cachedAt = undefined;
    this.process.dispose();
    super.dispose();
  }
}
