import { describeError, log } from "@notifier-kit/core";
import { AsyncResourceController } from "./asyncResourceController.js";
import type { AsyncOperation, ControllerOptions } from "./types.js";

/**
 * 建立 controller 並馬上跑第一次 operation。
 *
 * const todos = createResource(() => fetchTodos(), { resetOnRun: false });
 * todos.subscribe(() => render(todos));
 */
export function createResource<T extends {}>(
  operation: AsyncOperation<T>,
  options?: ControllerOptions<T>
): AsyncResourceController<T> {
  const controller = new AsyncResourceController<T>(options);

  // 失敗本來就會記進 controller；會走到這裡的只有 callback 自己丟錯
  void controller.runOperation(operation).catch((err: unknown) => {
    log({ type: "initial_run_failed", level: "error", error: describeError(err) });
  });

  return controller;
}
