import { vi } from "vitest";
import type { SendMailOptions } from "nodemailer";
import { loadConfig, type Config } from "../src/config.js";
import type { JobDeps } from "../src/job.js";

export const baseEnv = {
  FINNHUB_API_KEY: "test-key",
  EMAIL_USER: "monitor@example.com",
  EMAIL_APP_PASSWORD: "test-password",
  EMAIL_TO: "ops@example.com",
};

export const testConfig = (overrides: Record<string, string> = {}): Config =>
  loadConfig({ ...baseEnv, ...overrides });

/** 22:30 UTC on the 18th is 02:30 on the 19th in Dubai. */
export const NOW = new Date("2026-10-18T22:30:00Z");

export function fakeDeps(
  items: unknown[] | Error,
  cfg: Config = testConfig()
) {
  const sendMail = vi.fn(async (_mail: SendMailOptions) => ({ messageId: "1" }));
  const fetchIpos = vi.fn(async (_dateISO: string): Promise<unknown[]> => {
    if (items instanceof Error) throw items;
    return items;
  });
  const deps: JobDeps = {
    cfg,
    mailer: { sendMail },
    fetchIpos,
    now: () => NOW,
  };
  return { deps, sendMail, fetchIpos };
}
