export interface AppMetadata {
  appId: string; // catalog track id, e.g. "544007664"
  name: string;
  developer: string;
  version: string; // opaque, compared by equality only
  lastUpdated?: Date; // release date of the current version
  url: string;
  releaseNotes?: string;
}

export type FetchFailureReason = "not_found" | "error";

export interface FetchFailure {
  appId: string;
  reason: FetchFailureReason;
  message: string;
}

export type FetchOutcome = { ok: true; app: AppMetadata } | ({ ok: false } & FetchFailure);

export type ChangeRecord =
  | { kind: "first_observation"; app: AppMetadata }
  | { kind: "new_release"; app: AppMetadata; previousVersion: string };

export type ChangeKind = ChangeRecord["kind"];

// appId -> last notified version
export type VersionSnapshot = Record<string, string>;

export interface DiffResult {
  changes: ChangeRecord[];
  delta: VersionSnapshot; // only the ids that changed this cycle
  failures: FetchFailure[];
  unchanged: AppMetadata[];
}

export type CycleState = "complete" | "degraded" | "failed";

export interface CycleReport {
  state: CycleState;
  startedAt: string; // ISO
  finishedAt: string; // ISO
  checked: number;
  changes: ChangeRecord[];
  failures: FetchFailure[];
  delivered: boolean;
  committed: boolean;
  error?: string;
}
