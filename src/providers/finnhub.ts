// src/providers/finnhub.ts
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { AuthError, NetworkError } from "../errors.js";
import { log } from "../logger.js";

export const FINNHUB_BASE_URL = "https://finnhub.io/api/v1";
const IPO_CALENDAR_PATH = "/calendar/ipo";

export function createFinnhubClient(timeoutMs = 30_000): AxiosInstance {
  return axios.create({
    baseURL: FINNHUB_BASE_URL,
    timeout: timeoutMs,
    headers: { "User-Agent": "ipo-monitor/1.0" },
    // statuses are mapped to AuthError/NetworkError below
    validateStatus: () => true,
  });
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * Finnhub IPO calendar for a single day (from = to = dateISO).
 * One request, no retry: the next scheduled run is the retry.
 */
export async function fetchSameDayIpos(
  dateISO: string,
  apiKey: string,
  http: AxiosInstance = createFinnhubClient()
): Promise<unknown[]> {
  const url = FINNHUB_BASE_URL + IPO_CALENDAR_PATH;
  const t0 = Date.now();

  let res: AxiosResponse<unknown>;
  try {
    res = await http.get<unknown>(IPO_CALENDAR_PATH, {
      params: { from: dateISO, to: dateISO, token: apiKey },
    });
  } catch (e) {
    const msg = axios.isAxiosError(e)
      ? `${e.code ?? "ERR"} ${e.message}`
      : e instanceof Error
        ? e.message
        : String(e);
    log.warn("[FINNHUB] request failed", { dateISO, msg });
    throw new NetworkError(`Finnhub request failed: ${msg}`, url);
  }

  const { status } = res;
  if (status === 401 || status === 403) {
    throw new AuthError(
      `Finnhub rejected the API key (HTTP ${status})`,
      url,
      status
    );
  }
  if (status < 200 || status >= 300) {
    throw new NetworkError(`Finnhub returned HTTP ${status}`, url, status);
  }

  const data = res.data;
  if (!isObject(data)) {
    throw new NetworkError(
      `Finnhub returned an unreadable body (HTTP ${status})`,
      url,
      status
    );
  }
  let items: unknown[] = [];
  if (Array.isArray(data.ipoCalendar)) {
    items = data.ipoCalendar;
  } else {
    log.warn("[FINNHUB] response has no ipoCalendar array", { dateISO });
  }

  log.info("[FINNHUB] ipo calendar", {
    dateISO,
    items: items.length,
    tookMs: Date.now() - t0,
  });
  return items;
}
