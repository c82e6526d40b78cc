import { describe, it, expect } from "vitest";
import { runOnce } from "../src/job.js";
import { NetworkError, SendError } from "../src/errors.js";
import { fakeDeps, testConfig } from "./fixtures.js";

const abc = {
  symbol: "ABC",
  name: "Abc Corp",
  exchange: "NASDAQ",
  price: 20,
  numberOfShares: 15_000_000,
  date: "2026-10-19",
};
const xyz = {
  symbol: "XYZ",
  name: "Xyz Ltd",
  exchange: "NASDAQ",
  price: 10,
  numberOfShares: 10_000_000,
  date: "2026-10-19",
};

describe("runOnce", () => {
  it("queries the calendar for today's Dubai date", async () => {
    const { deps, fetchIpos } = fakeDeps([]);
    const result = await runOnce(deps);
    expect(fetchIpos).toHaveBeenCalledWith("2026-10-19");
    expect(result.dateISO).toBe("2026-10-19");
  });

  it("emails a qualifying IPO", async () => {
    const { deps, sendMail } = fakeDeps([abc]);
    const result = await runOnce(deps);

    expect(result.emailed).toBe(true);
    expect(result.qualified.map((q) => q.offerAmount)).toEqual([300_000_000]);
    expect(sendMail).toHaveBeenCalledTimes(1);

    const mail = sendMail.mock.calls[0]?.[0];
    expect(mail?.from).toBe("monitor@example.com");
    expect(mail?.to).toBe("ops@example.com");
    expect(mail?.subject).toBe("IPO Monitor 2026-10-19 - 1 qualifying IPO(s)");
    expect(String(mail?.text).split("\n")).toContain(
      "- ABC | Abc Corp | NASDAQ | USD 300,000,000"
    );
  });

  it("sends nothing when no IPO clears the threshold", async () => {
    const { deps, sendMail } = fakeDeps([xyz]);
    const result = await runOnce(deps);
    expect(result.emailed).toBe(false);
    expect(result.qualified).toEqual([]);
    expect(result.stats).toEqual({
      total: 1,
      usExchange: 1,
      missingData: 0,
      qualified: 0,
    });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it("completes without mail on an empty calendar", async () => {
    const { deps, sendMail } = fakeDeps([]);
    await expect(runOnce(deps)).resolves.toMatchObject({ emailed: false });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it("sends the 'none today' notice when configured to", async () => {
    const { deps, sendMail } = fakeDeps(
      [xyz],
      testConfig({ NOTIFY_WHEN_EMPTY: "true" })
    );
    const result = await runOnce(deps);
    expect(result.emailed).toBe(true);
    const mail = sendMail.mock.calls[0]?.[0];
    expect(mail?.subject).toBe("IPO Monitor 2026-10-19 - 0 qualifying IPO(s)");
    expect(String(mail?.text).split("\n")[0]).toBe(
      "No U.S. same-day IPOs with offer amount of at least USD 200,000,000."
    );
  });

  it("delivers to every configured recipient in one message", async () => {
    const { deps, sendMail } = fakeDeps(
      [abc],
      testConfig({ EMAIL_TO: "a@example.com,b@example.com" })
    );
    await runOnce(deps);
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0]?.[0].to).toBe("a@example.com, b@example.com");
  });

  it("fails before any send when the fetch fails", async () => {
    const { deps, sendMail } = fakeDeps(
      new NetworkError("Finnhub returned HTTP 500", undefined, 500)
    );
    await expect(runOnce(deps)).rejects.toBeInstanceOf(NetworkError);
    expect(sendMail).not.toHaveBeenCalled();
  });

  it("propagates SMTP failures", async () => {
    const { deps, sendMail } = fakeDeps([abc]);
    sendMail.mockRejectedValueOnce(new Error("connection refused"));
    await expect(runOnce(deps)).rejects.toBeInstanceOf(SendError);
  });
});
