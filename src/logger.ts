// src/logger.ts
type Level = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevel(x: string): x is Level {
  return Object.hasOwn(ORDER, x);
}

function threshold(): number {
  const raw = String(process.env.LOG_LEVEL ?? "info").toLowerCase();
  return ORDER[isLevel(raw) ? raw : "info"];
}

function emit(level: Exclude<Level, "silent">, args: unknown[]) {
  if (ORDER[level] < threshold()) return;
  const line = [new Date().toISOString(), level.toUpperCase(), ...args];
  if (level === "error") console.error(...line);
  else if (level === "warn") console.warn(...line);
  else console.log(...line);
}

export const log = {
  debug: (...args: unknown[]) => emit("debug", args),
  info: (...args: unknown[]) => emit("info", args),
  warn: (...args: unknown[]) => emit("warn", args),
  error: (...args: unknown[]) => emit("error", args),
};
