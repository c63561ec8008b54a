import cron, { type ScheduledTask } from "node-cron";
import type { CycleReport } from "./types.js";
import { errorMessage } from "./utils.js";

export type CycleRunner = (signal: AbortSignal) => Promise<CycleReport>;

/**
 * Fires cycles on a cron schedule, at most one at a time. A trigger that
 * arrives while a cycle is running is dropped.
 */
export class Poller {
  private task: ScheduledTask | null = null;
  private active: Promise<CycleReport | null> | null = null;
  private controller: AbortController | null = null;

  constructor(private readonly runCycle: CycleRunner) {}

  get running(): boolean {
    return this.active !== null;
  }

  /** Runs one cycle immediately, then on every tick of the schedule. */
  start(schedule: string): Promise<CycleReport | null> {
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron schedule: ${schedule}`);
    }
    this.task?.stop();
    this.task = cron.schedule(schedule, async () => {
      console.log(`[BOT] Scheduled run started at ${new Date().toISOString()}`);
      await this.trigger();
    });
    return this.trigger();
  }

  trigger(): Promise<CycleReport | null> {
    if (this.active) {
      console.warn("[BOT] Previous cycle still running, skipping this trigger");
      return Promise.resolve(null);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.active = this.execute(controller.signal).finally(() => {
      this.active = null;
      this.controller = null;
    });
    return this.active;
  }

  /** Stops the schedule and waits for a running cycle to settle. */
  async stop(): Promise<void> {
    this.task?.stop();
    this.task = null;
    this.controller?.abort();
    if (this.active) await this.active;
  }

  private async execute(signal: AbortSignal): Promise<CycleReport | null> {
    try {
      return await this.runCycle(signal);
    } catch (err) {
      console.error("[BOT] Cycle runner error:", errorMessage(err));
      return null;
    }
  }
}
