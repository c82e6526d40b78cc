// src/run_daily.ts
import { loadConfig } from "./config.js";
import { createJobDeps, runOnce } from "./job.js";
import { gracefulStop, startDailySchedule } from "./scheduler.js";

// Alternative to an external cron: keep this process running.
const cfg = loadConfig();
const deps = createJobDeps(cfg);

const task = startDailySchedule(cfg.SCHEDULE_CRON, cfg.SCHEDULE_TZ, () =>
  runOnce(deps)
);

const stop = gracefulStop(task);
process.on("SIGINT", stop);
process.on("SIGTERM", stop);
