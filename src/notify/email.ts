// src/notify/email.ts
import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { IpoEvent, IpoStats } from "../types.js";
import { SendError } from "../errors.js";
import { log } from "../logger.js";

/** The slice of a nodemailer transport the monitor needs. */
export interface Mailer {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export type SmtpSettings = {
  host: string;
  port: number;
  user: string;
  password: string;
};

export type EmailMessage = {
  from: string;
  to: string[];
  subject: string;
  text: string;
};

const usd = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export const formatUsd = (amount: number) => `USD ${usd.format(amount)}`;

/** STARTTLS submission (port 587) unless the port is 465. */
export function createSmtpMailer(s: SmtpSettings): Mailer {
  return nodemailer.createTransport({
    host: s.host,
    port: s.port,
    secure: s.port === 465,
    requireTLS: s.port !== 465,
    auth: { user: s.user, pass: s.password },
  });
}

export function parseRecipients(list: string): string[] {
  return list
    .split(",")
    .map((a) => a.trim())
    .filter(Boolean);
}

export function buildSubject(dateISO: string, count: number): string {
  return `IPO Monitor ${dateISO} - ${count} qualifying IPO(s)`;
}

export function buildEmailBody(
  ipos: IpoEvent[],
  dateISO: string,
  stats: IpoStats,
  minOfferAmount: number
): string {
  const summary = [
    `Date (Dubai): ${dateISO}`,
    `Total IPOs returned: ${stats.total}`,
    `U.S. exchanges (NASDAQ/NYSE/AMEX): ${stats.usExchange}`,
    `Missing price/shares: ${stats.missingData}`,
    `Offer >= ${formatUsd(minOfferAmount)}: ${stats.qualified}`,
    "",
  ];

  if (!ipos.length) {
    return [
      `No U.S. same-day IPOs with offer amount of at least ${formatUsd(
        minOfferAmount
      )}.`,
      "",
      ...summary,
    ].join("\n");
  }

  return [
    `U.S. Same-Day IPOs on ${dateISO} (>= ${formatUsd(minOfferAmount)})`,
    "",
    ...summary,
    ...ipos.map(
      (i) =>
        `- ${i.symbol} | ${i.name} | ${i.exchange} | ${formatUsd(i.offerAmount)}`
    ),
  ].join("\n");
}

function responseCode(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("responseCode" in e)) {
    return undefined;
  }
  return typeof e.responseCode === "number" ? e.responseCode : undefined;
}

/** Single plain-text message; any transport failure becomes a SendError. */
export async function sendEmail(mailer: Mailer, msg: EmailMessage) {
  if (!msg.to.length) throw new SendError("No recipients configured");
  try {
    await mailer.sendMail({
      from: msg.from,
      to: msg.to.join(", "),
      subject: msg.subject,
      text: msg.text,
    });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    log.error("[EMAIL] send failed", { to: msg.to, reason });
    throw new SendError(`SMTP send failed: ${reason}`, responseCode(e));
  }
  log.info("[EMAIL] sent", { to: msg.to, subject: msg.subject });
}
