import { Notifier, type Listener, type NotifyOptions, type Unsubscribe } from "./notifier.js";

type Comparator<T> = (a: T, b: T) => boolean;
const defaultEquals = Object.is;

export interface ReadonlySignal<T> {
  get: () => T;
  subscribe: (listener: Listener) => Unsubscribe;
}

export interface Signal<T> extends ReadonlySignal<T> {
  set: (next: T | ((prev: T) => T), options?: NotifyOptions) => void;
  dispose: () => void;
  readonly disposed: boolean;
}

class SignalNode<T> extends Notifier {
  constructor(public value: T, readonly equals: Comparator<T>) {
    super();
  }

  write(next: T, options?: NotifyOptions) {
    if (this.disposed) return;
    if (this.equals(this.value, next)) return;
    this.value = next;
    this.notify(options);
  }
}

/**
 * 單一值的 notifier。
 * equals 回傳 true 時不通知；傳 `() => false` 則每次 set 都會通知。
 */
export function signal<T>(initial: T, equals: Comparator<T> = defaultEquals): Signal<T> {
  const node = new SignalNode(initial, equals);

  const get = () => node.value;

  const set = (next: T | ((prev: T) => T), options?: NotifyOptions) => {
    const nxtVal = typeof next === "function" ? (next as (p: T) => T)(node.value) : next;
    node.write(nxtVal, options);
  };

  return {
    get,
    set,
    subscribe: (listener) => node.subscribe(listener),
    dispose: () => node.dispose(),
    get disposed() {
      return node.disposed;
    },
  };
}
