import cron, { type ScheduledTask } from "node-cron";
import { errorMessage, logger } from "../utils/logger";

export function assertValidCron(cronExp: string): void {
  if (!cron.validate(cronExp)) {
    throw new Error(`Invalid cron expression: ${cronExp}`);
  }
}

/** Runs `task` on the cron schedule; a run still in progress makes the next tick a no-op. */
export function startScheduler(cronExp: string, task: () => Promise<void>): ScheduledTask {
  assertValidCron(cronExp);
  let running = false;
  logger.info({ cron: cronExp }, "Scheduler started");
  return cron.schedule(cronExp, () => {
    if (running) {
      logger.warn({ cron: cronExp }, "Previous run still in progress, skipping tick");
      return;
    }
    running = true;
    task()
      .catch((e: unknown) => logger.error({ error: errorMessage(e) }, "Scheduled run failed"))
      .finally(() => {
        running = false;
      });
  });
}
