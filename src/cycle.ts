import pLimit from "p-limit";
import { detectChanges } from "./diff.js";
import { formatNotification, type NotificationPayload } from "./format.js";
import type { VersionStore } from "./store.js";
import type { ChangeRecord, CycleReport, FetchFailure, FetchOutcome, VersionSnapshot } from "./types.js";
import { errorMessage } from "./utils.js";

export interface CycleDependencies {
  trackedIds: readonly string[];
  fetchApp: (appId: string) => Promise<FetchOutcome>;
  store: VersionStore;
  deliver: (payload: NotificationPayload) => Promise<void>;
  concurrency?: number;
  /** Fetches still pending after this long count as failures for their app. */
  cycleTimeoutMs?: number;
  maxNotesLength?: number;
}

interface ReportProgress {
  changes?: ChangeRecord[];
  failures?: FetchFailure[];
  delivered?: boolean;
  committed?: boolean;
  error?: string;
}

interface Deadline {
  reached: Promise<"timeout">;
  cancel(): void;
}

function createDeadline(ms: number): Deadline {
  let cancel = (): void => {};
  const reached = new Promise<"timeout">((resolve) => {
    const timer = setTimeout(() => resolve("timeout"), ms);
    cancel = () => clearTimeout(timer);
  });
  return { reached, cancel: () => cancel() };
}

export class CycleController {
  constructor(private readonly deps: CycleDependencies) {}

  /** Runs fetch, diff, format, deliver and commit once. Never rejects. */
  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = new Date().toISOString();
    const { trackedIds, store } = this.deps;
    console.log(`[CYCLE] Checking ${trackedIds.length} apps`);

    const finish = (progress: ReportProgress): CycleReport => {
      const failures = progress.failures ?? [];
      const state = progress.error ? "failed" : failures.length > 0 ? "degraded" : "complete";
      const report: CycleReport = {
        state,
        startedAt,
        finishedAt: new Date().toISOString(),
        checked: trackedIds.length,
        changes: progress.changes ?? [],
        failures,
        delivered: progress.delivered ?? false,
        committed: progress.committed ?? false,
      };
      if (progress.error) {
        report.error = progress.error;
        console.error(`[CYCLE] Cycle failed: ${progress.error}`);
      } else {
        console.log(
          `[CYCLE] Cycle ${state}: ${report.changes.length} changes, ${failures.length} fetch failures`
        );
      }
      return report;
    };

    let snapshot: VersionSnapshot;
    try {
      snapshot = await store.load();
    } catch (err) {
      return finish({ error: `Failed to load stored versions: ${errorMessage(err)}` });
    }

    let outcomes: Map<string, FetchOutcome>;
    try {
      outcomes = await this.fetchAll();
    } catch (err) {
      return finish({ error: `Fetching failed: ${errorMessage(err)}` });
    }

    const diff = detectChanges(trackedIds, outcomes, snapshot);
    for (const failure of diff.failures) {
      console.warn(`[CYCLE] Skipping ${failure.appId} (${failure.reason}): ${failure.message}`);
    }
    for (const app of diff.unchanged) {
      console.log(`[CYCLE] No update for ${app.name} (still v${app.version})`);
    }
    for (const change of diff.changes) {
      const from = change.kind === "new_release" ? change.previousVersion : "none";
      console.log(`[CYCLE] Update found for ${change.app.name}: ${from} → ${change.app.version}`);
    }

    const { changes, failures, delta } = diff;

    let payload: NotificationPayload | null;
    try {
      payload = formatNotification(changes, { maxNotesLength: this.deps.maxNotesLength });
    } catch (err) {
      return finish({ changes, failures, error: `Formatting failed: ${errorMessage(err)}` });
    }

    if (signal?.aborted) {
      return finish({ changes, failures, error: "Cycle cancelled before delivery" });
    }

    let delivered = false;
    if (payload) {
      try {
        await this.deps.deliver(payload);
        delivered = true;
        console.log(`[CYCLE] Consolidated notification sent for ${changes.length} app updates`);
      } catch (err) {
        // Leave the store alone so the same changes are reported next cycle
        return finish({ changes, failures, error: `Delivery failed: ${errorMessage(err)}` });
      }
    }

    if (Object.keys(delta).length === 0) {
      return finish({ changes, failures, delivered });
    }

    try {
      await store.commit({ ...snapshot, ...delta });
    } catch (err) {
      return finish({ changes, failures, delivered, error: `Failed to commit versions: ${errorMessage(err)}` });
    }
    return finish({ changes, failures, delivered, committed: true });
  }

  private async fetchAll(): Promise<Map<string, FetchOutcome>> {
    const { trackedIds, fetchApp, cycleTimeoutMs } = this.deps;
    const limiter = pLimit(Math.max(1, this.deps.concurrency ?? 1));
    const uniqueIds = Array.from(new Set(trackedIds));

    const deadline = cycleTimeoutMs === undefined ? null : createDeadline(cycleTimeoutMs);

    const fetchOne = async (appId: string): Promise<FetchOutcome> => {
      try {
        return await fetchApp(appId);
      } catch (err) {
        return { ok: false, appId, reason: "error", message: errorMessage(err) };
      }
    };

    try {
      const outcomes = await Promise.all(
        uniqueIds.map(async (appId): Promise<[string, FetchOutcome]> => {
          const pending = limiter(() => fetchOne(appId));
          const settled = deadline ? await Promise.race([pending, deadline.reached]) : await pending;
          if (settled === "timeout") {
            return [appId, { ok: false, appId, reason: "error", message: `timed out after ${cycleTimeoutMs}ms` }];
          }
          return [appId, settled];
        })
      );
      return new Map(outcomes);
    } finally {
      deadline?.cancel();
      limiter.clearQueue();
    }
  }
}
