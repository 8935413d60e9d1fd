export {
  AsyncTaskTracker,
  abortableSleep,
  fingerprintOf,
  type BeginResult,
  type DeepTaskCapability,
  type PollOptions,
  type PollOutcome,
  type ReconcileOptions,
  type RecoveryReport,
  type SleepFn,
  type TrackerDependencies,
} from "./tracker.js";
export {
  HANDLE_PREFIX,
  StoreHandleStore,
  SupabaseHandleStore,
  TaskHandleSchema,
  handleKey,
  type HandleKey,
  type HandleStore,
  type TaskHandle,
} from "./handle-store.js";
