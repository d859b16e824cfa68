import type { AppBoundaryError } from "./appError";

export type FetchTask = {
  sid: bigint;
  symbol: string;
  // Walked in order; the first source to succeed wins.
  sources: readonly string[];
};

export type TaskState = "succeeded" | "failed" | "skipped";

export type TaskOutcome = {
  sid: bigint;
  symbol: string;
  state: TaskState;
  fromCache: boolean;
  source?: string;
  attempts: number;
  error?: AppBoundaryError;
};

export type BatchRunState = "success" | "completed_with_errors" | "failed";

export type LoaderRunReport = {
  runId: string;
  processName: string;
  state: BatchRunState;
  startedAt: Date;
  endedAt: Date;
  succeeded: number;
  failed: number;
  skipped: number;
  cacheHits: number;
  outcomes: TaskOutcome[];
};

export type ProcessRunEntity = {
  id: string;
  processName: string;
  startedAt: Date;
  endedAt: Date | null;
  endState: BatchRunState | "running";
  errorMessage: string | null;
  recordsProcessed: number;
};
