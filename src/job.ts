// src/job.ts
import type { Config } from "./config.js";
import type { IpoEvent, IpoStats } from "./types.js";
import { dubaiDateISO } from "./utils/time.js";
import { analyzeIpos } from "./pipeline/filter.js";
import { createFinnhubClient, fetchSameDayIpos } from "./providers/finnhub.js";
import {
  buildEmailBody,
  createSmtpMailer,
  buildSubject,
  parseRecipients,
  sendEmail,
  type Mailer,
} from "./notify/email.js";
import { log } from "./logger.js";

export type JobDeps = {
  cfg: Config;
  mailer: Mailer;
  /** Returns the raw calendar entries for one date. */
  fetchIpos: (dateISO: string) => Promise<unknown[]>;
  now?: () => Date;
};

export type JobResult = {
  dateISO: string;
  qualified: IpoEvent[];
  stats: IpoStats;
  emailed: boolean;
};

/**
 * One monitor pass: Dubai date → calendar fetch → filter → at most one email.
 * Fetch errors propagate before any send is attempted.
 */
export async function runOnce(deps: JobDeps): Promise<JobResult> {
  const { cfg, mailer, fetchIpos } = deps;
  const dateISO = dubaiDateISO((deps.now ?? (() => new Date()))());
  log.info("[JOB] start", { dateISO, minOffer: cfg.MIN_OFFER_AMOUNT_USD });

  const items = await fetchIpos(dateISO);
  const { qualified, stats } = analyzeIpos(items, cfg.MIN_OFFER_AMOUNT_USD);
  log.info("[JOB] analyzed", stats);

  if (!qualified.length && !cfg.NOTIFY_WHEN_EMPTY) {
    log.info("[JOB] no qualifying IPOs, nothing to send", { dateISO });
    return { dateISO, qualified, stats, emailed: false };
  }

  const subject = buildSubject(dateISO, qualified.length);
  await sendEmail(mailer, {
    from: cfg.EMAIL_USER,
    to: parseRecipients(cfg.EMAIL_TO),
    subject,
    text: buildEmailBody(qualified, dateISO, stats, cfg.MIN_OFFER_AMOUNT_USD),
  });

  for (const i of qualified) {
    log.info("[JOB] qualified", { symbol: i.symbol, offer: i.offerAmount });
  }
  return { dateISO, qualified, stats, emailed: true };
}

/** Production wiring: Finnhub over axios, SMTP over nodemailer. */
export function createJobDeps(cfg: Config): JobDeps {
  const http = createFinnhubClient(cfg.FINNHUB_TIMEOUT_MS);
  return {
    cfg,
    mailer: createSmtpMailer({
      host: cfg.SMTP_HOST,
      port: cfg.SMTP_PORT,
      user: cfg.EMAIL_USER,
      password: cfg.EMAIL_APP_PASSWORD,
    }),
    fetchIpos: (dateISO) => fetchSameDayIpos(dateISO, cfg.FINNHUB_API_KEY, http),
  };
}
