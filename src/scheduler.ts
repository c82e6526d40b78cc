// src/scheduler.ts
import cron, { type ScheduledTask } from "node-cron";
import { dubaiDateISO } from "./utils/time.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * Wraps a task so it runs at most once per Dubai date. A failed run is
 * logged and still counts for the day; the next day's tick tries again.
 */
export function oncePerDay(
  task: () => Promise<unknown>,
  now: () => Date = () => new Date()
): () => Promise<boolean> {
  let lastRunDate: string | null = null;
  return async () => {
    const today = dubaiDateISO(now());
    if (lastRunDate === today) {
      log.info("[SCHED] already ran today, skipping", { today });
      return false;
    }
    lastRunDate = today;
    log.info("[SCHED] running IPO monitor", { today });
    try {
      await task();
    } catch (err) {
      log.error("[SCHED] run failed:", err);
    }
    return true;
  };
}

export function startDailySchedule(
  expression: string,
  timezone: string,
  task: () => Promise<unknown>
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid cron expression: "${expression}"`, [
      "SCHEDULE_CRON",
    ]);
  }
  const tick = oncePerDay(task);
  log.info("[SCHED] started", { expression, timezone });
  return cron.schedule(
    expression,
    () => {
      tick().catch((err) => log.error("[SCHED] tick error:", err));
    },
    { timezone }
  );
}

/**
 * Signal handler: stops the cron timer and lets the event loop drain, so a
 * run already sending mail finishes before the process exits.
 */
export function gracefulStop(task: Pick<ScheduledTask, "stop">): () => void {
  let stopped = false;
  return () => {
    if (stopped) return;
    stopped = true;
    log.info("[SCHED] stopping");
    task.stop();
    process.exitCode = 0;
  };
}
