export { buildWorkerConfig, loadWorkerConfig } from "./config";
export type { WorkerConfig, SchedulerConfig, TrackingConfig } from "./config";
export { Scheduler, validateSegments } from "./scheduler/scheduler";
export type { FailedItem, PublishedPart, RunItemRef, RunOutcome, RunSummary, SchedulerDeps } from "./scheduler/scheduler";
export { selectWork } from "./scheduler/selection";
export { createWorkItem, ingestCandidates } from "./discovery/ingest";
export type { IngestSummary } from "./discovery/ingest";
export { summarizeTracking } from "./report/status";
export type { TrackingReport } from "./report/status";
export { JsonFileTrackingStore } from "./tracking/fileStore";
export { SupabaseTrackingStore } from "./tracking/supabaseStore";
export { createTrackingStore } from "./tracking/createStore";
export type { TrackingStore } from "./tracking/types";
export { classifyStageError } from "./stages/types";
export type {
  FetchExecutor,
  PublishExecutor,
  StageExecutor,
  StageExecutors,
  TransformExecutor,
} from "./stages/types";
export { WorkerRuntime } from "./runtime";
export { executeCommand, exitCodeFor, parseCliArgs } from "./commands";
export { createRunNotifier, formatRunMessage, NoopRunNotifier, TelegramRunNotifier } from "./notifications/runNotifier";
export type { RunNotifier } from "./notifications/runNotifier";
export { TelegramClient } from "./services/telegram/client";
