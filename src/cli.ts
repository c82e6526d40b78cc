// src/cli.ts
import { loadConfig, type Config } from "./config.js";
import { createJobDeps, runOnce, type JobDeps } from "./job.js";
import { MonitorError } from "./errors.js";
import { log } from "./logger.js";

type CliDeps = {
  load?: () => Config;
  makeDeps?: (cfg: Config) => JobDeps;
};

/** One monitor run; resolves to the process exit code (0 also for "nothing to send"). */
export async function runCli({
  load = loadConfig,
  makeDeps = createJobDeps,
}: CliDeps = {}): Promise<number> {
  try {
    const result = await runOnce(makeDeps(load()));
    log.info("[RUN] done", {
      dateISO: result.dateISO,
      qualified: result.qualified.map((i) => i.symbol),
      emailed: result.emailed,
    });
    return 0;
  } catch (e) {
    if (e instanceof MonitorError) log.error(`[RUN] ${e.name}:`, e.message);
    else log.error("[RUN] unexpected error:", e);
    return 1;
  }
}
