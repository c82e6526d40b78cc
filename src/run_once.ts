// src/run_once.ts
import { runCli } from "./cli.js";

// Exit code: 0 on success (including no qualifying IPOs), 1 on any failure.
process.exitCode = await runCli();
