import { isStageFailure, type Segment, type StageFailureKind, type WorkItem } from "@shortloop/shared";

export type StageName = "fetch" | "transform" | "publish";

/**
 * A unit of external work invoked by the scheduler. Executors report
 * failures by throwing; a StageFailure carries its kind, anything else is
 * treated as transient.
 */
export interface StageExecutor<TInput, TOutput> {
  readonly stage: StageName;
  execute(input: TInput): Promise<TOutput>;
}

export interface FetchOutput {
  /** Opaque handle to the retrieved source */
  artifactRef: string;
}

export type FetchInput = Pick<WorkItem, "id" | "title" | "sourceUrl">;

export interface TransformInput {
  item: Pick<WorkItem, "id" | "title">;
  sourceArtifactRef: string;
}

export interface PublishInput {
  item: Pick<WorkItem, "id" | "title" | "sourceUrl" | "segments">;
  segment: Segment;
}

export interface PublishOutput {
  remoteId: string;
}

export type FetchExecutor = StageExecutor<FetchInput, FetchOutput>;
export type TransformExecutor = StageExecutor<TransformInput, Segment[]>;
export type PublishExecutor = StageExecutor<PublishInput, PublishOutput>;

export interface StageExecutors {
  fetch: FetchExecutor;
  transform: TransformExecutor;
  publish: PublishExecutor;
}

/**
 * Failure kind of anything an executor threw. Errors that expose a boolean
 * `retryable` flag (API client errors) map onto transient/permanent.
 */
export function classifyStageError(error: unknown): StageFailureKind {
  if (isStageFailure(error)) {
    return error.kind;
  }
  if (typeof error === "object" && error !== null && "retryable" in error && typeof error.retryable === "boolean") {
    return error.retryable ? "transient" : "permanent";
  }
  return "transient";
}
