// Cron schedules for report ingestion and the daily medal job.

import cron, { ScheduledTask } from "node-cron";
import { AppConfig } from "./config";

export interface ScheduledJobs {
  ingest: () => Promise<unknown>;
  medals: () => Promise<unknown>;
}

/**
 * Starts both jobs in the configured time zone. A run that is still in
 * progress when its next tick fires makes that tick a no-op.
 */
export function startScheduler(config: AppConfig, jobs: ScheduledJobs): ScheduledTask[] {
  const tasks = [
    cron.schedule(config.ingest.schedule, guarded("ingest", jobs.ingest), { timezone: config.timeZone }),
    cron.schedule(config.medalSchedule, guarded("medals", jobs.medals), { timezone: config.timeZone }),
  ];
  console.log(
    `[Steps] Scheduled ingestion (${config.ingest.schedule}) and medals (${config.medalSchedule}) in ${config.timeZone}`
  );
  return tasks;
}

export function guarded(name: string, job: () => Promise<unknown>): () => void {
  let running = false;
  return () => {
    if (running) {
      console.warn(`[Steps] ${name}: previous run still in progress, skipping.`);
      return;
    }
    running = true;
    void job()
      .catch((err) => console.error(`[Steps] ${name}: job failed:`, err))
      .finally(() => {
        running = false;
      });
  };
}
