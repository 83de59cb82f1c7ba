export { AsyncResourceController, DEFAULT_CONTROLLER_OPTIONS } from "./asyncResourceController.js";
export type { ControllerDefaults } from "./asyncResourceController.js";
export { createResource } from "./createResource.js";
export { OperationError } from "./errors.js";
export { NO_CACHE, cacheFor, isCacheFresh } from "./cache.js";
export type { CacheOption } from "./cache.js";
export type {
  AsyncOperation,
  ControllerOptions,
  DoneCallback,
  ErrorCallback,
  FailedRefreshPolicy,
  MaybePromise,
  ProcessState,
  RefreshOptions,
  ResetOptions,
  RunOptions,
  SetErrorOptions,
  SuccessCallback,
  UpdateOptions,
  ViewState,
  WhenBranches,
} from "./types.js";
