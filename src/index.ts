#!/usr/bin/env node
import { loadConfig, loadLookupConfig, type AppConfig, type LookupConfig } from "./config.js";
import { loadTrackedApps } from "./apps.js";
import { AppStoreCatalog, createCatalogHttp } from "./catalog.js";
import { CycleController } from "./cycle.js";
import { initializeFirestore } from "./firebase.js";
import { Poller } from "./poller.js";
import { SlackNotifier, createSlackHttp } from "./slack.js";
import { FirestoreVersionStore, JsonFileVersionStore, type VersionStore } from "./store.js";
import { errorMessage, formatUtcTimestamp } from "./utils.js";

function createStore(config: AppConfig): VersionStore {
  const firestore = initializeFirestore(config);
  if (firestore) {
    console.log(`[STORE] Using Firestore ${config.FIRESTORE_COLLECTION}/${config.FIRESTORE_VERSIONS_DOC}`);
    return new FirestoreVersionStore(
      firestore.collection(config.FIRESTORE_COLLECTION).doc(config.FIRESTORE_VERSIONS_DOC)
    );
  }
  console.log(`[STORE] Using ${config.STATE_PATH}`);
  return new JsonFileVersionStore(config.STATE_PATH);
}

async function lookupCommand(appId: string, config: LookupConfig): Promise<number> {
  const catalog = new AppStoreCatalog(createCatalogHttp(config.FETCH_TIMEOUT_MS), config.CATALOG_COUNTRY);
  const outcome = await catalog.lookup(appId);
  if (!outcome.ok) {
    console.error(`Invalid app ID or app not found: ${appId} (${outcome.message})`);
    return 1;
  }
  const { app } = outcome;
  console.log(`Name: ${app.name}`);
  console.log(`Developer: ${app.developer}`);
  console.log(`Version: ${app.version}`);
  console.log(`Updated: ${formatUtcTimestamp(app.lastUpdated)}`);
  console.log(`URL: ${app.url}`);
  return 0;
}

async function main(argv: string[]): Promise<void> {
  if (argv[0] === "lookup") {
    if (!argv[1]) {
      console.error("Usage: app-release-monitor lookup <appId>");
      process.exit(1);
    }
    process.exit(await lookupCommand(argv[1], loadLookupConfig()));
  }

  const config = loadConfig();
  const trackedIds = loadTrackedApps(config.TRACKED_APPS_FILE, config.TRACKED_APP_IDS);
  const catalog = new AppStoreCatalog(createCatalogHttp(config.FETCH_TIMEOUT_MS), config.CATALOG_COUNTRY);
  const slack = new SlackNotifier(createSlackHttp(), config.SLACK_BOT_TOKEN, config.SLACK_CHANNEL);

  const controller = new CycleController({
    trackedIds,
    fetchApp: (appId) => catalog.lookup(appId),
    store: createStore(config),
    deliver: (payload) => slack.deliver(payload),
    concurrency: config.FETCH_CONCURRENCY,
    cycleTimeoutMs: config.CYCLE_TIMEOUT_MS,
    maxNotesLength: config.RELEASE_NOTES_MAX_LENGTH,
  });

  if (argv.includes("--once")) {
    const report = await controller.runCycle();
    process.exit(report.state === "failed" ? 1 : 0);
  }

  console.log(`[BOT] App release monitor starting. Tracking ${trackedIds.length} apps, schedule: ${config.CRON_SCHEDULE}`);
  const poller = new Poller((signal) => controller.runCycle(signal));

  const shutdown = async (sig: string): Promise<void> => {
    console.log(`[BOT] ${sig} received, stopping`);
    await poller.stop();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  // Run immediately at startup
  await poller.start(config.CRON_SCHEDULE);
  console.log("[BOT] Initial run completed.");
}

main(process.argv.slice(2)).catch((e) => {
  console.error("[BOT] Fatal:", errorMessage(e));
  process.exit(1);
});
