import { describeError, log } from "./logging.js";
import { scheduleJob, type Schedulable } from "./scheduler.js";

export type Listener = () => void;
export type Unsubscribe = () => void;

export interface NotifyOptions {
  /** true：延到下一個 microtask 才送出（例如正在切換頁面時） */
  deferred?: boolean;
}

export interface Subscribable {
  subscribe(listener: Listener): Unsubscribe;
}

/**
 * 最小的 change notifier。
 *
 * - 依訂閱順序通知（Set 保留插入順序）
 * - 通知時迭代快照，listener 裡 subscribe / unsubscribe 不影響這一輪
 * - 某個 listener 丟錯不會中斷其他 listener，錯誤寫進 log
 * - dispose 之後所有通知（包含已排進佇列的）都不會送出
 */
export class Notifier implements Subscribable {
  private listeners = new Set<Listener>();
  private isDisposed = false;

  get disposed() {
    return this.isDisposed;
  }

  get hasListeners() {
    return this.listeners.size > 0;
  }

  subscribe(listener: Listener): Unsubscribe {
    if (this.isDisposed) {
      log({ type: "subscribe_after_dispose", level: "warn", notifier: this.constructor.name });
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected notify(options: NotifyOptions = {}) {
    if (this.isDisposed) return;

    if (!options.deferred) {
      this.dispatch();
      return;
    }

    const isDisposed = () => this.isDisposed;
    const job: Schedulable = {
      run: () => this.dispatch(),
      get disposed() {
        return isDisposed();
      },
    };
    scheduleJob(job);
  }

  private dispatch() {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (e) {
        log({
          type: "listener_error",
          level: "error",
          notifier: this.constructor.name,
          error: describeError(e),
        });
      }
    }
  }

  dispose() {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.listeners.clear();
  }
}
