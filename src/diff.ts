import type { DiffResult, FetchOutcome, VersionSnapshot } from "./types.js";

export function detectChanges(
  trackedIds: readonly string[],
  outcomes: ReadonlyMap<string, FetchOutcome>,
  snapshot: Readonly<VersionSnapshot>
): DiffResult {
  const result: DiffResult = { changes: [], delta: {}, failures: [], unchanged: [] };
  const visited = new Set<string>();

  // Configured order is the output order, whatever order the fetches settled in
  for (const appId of trackedIds) {
    if (visited.has(appId)) continue;
    visited.add(appId);

    const outcome = outcomes.get(appId);
    if (!outcome) {
      result.failures.push({ appId, reason: "error", message: "no fetch result" });
      continue;
    }
    if (!outcome.ok) {
      result.failures.push({ appId, reason: outcome.reason, message: outcome.message });
      continue;
    }

    const { app } = outcome;
    const previous = Object.hasOwn(snapshot, appId) ? snapshot[appId] : undefined;

    if (previous === undefined) {
      result.changes.push({ kind: "first_observation", app });
      result.delta[appId] = app.version;
    } else if (previous !== app.version) {
      // No ordering on versions: a rollback is reported like any other release
      result.changes.push({ kind: "new_release", app, previousVersion: previous });
      result.delta[appId] = app.version;
    } else {
      result.unchanged.push(app);
    }
  }

  return result;
}
