import { describe, it, expect } from "vitest";
import { dubaiDateISO } from "../src/utils/time.js";

describe("dubaiDateISO", () => {
  it("rolls over to the next day after 20:00 UTC", () => {
    expect(dubaiDateISO(new Date("2026-03-10T23:30:00Z"))).toBe("2026-03-11");
    expect(dubaiDateISO(new Date("2026-03-10T20:00:00Z"))).toBe("2026-03-11");
  });

  it("stays on the UTC date before 20:00 UTC", () => {
    expect(dubaiDateISO(new Date("2026-03-10T19:59:59Z"))).toBe("2026-03-10");
    expect(dubaiDateISO(new Date("2026-03-10T00:00:00Z"))).toBe("2026-03-10");
  });

  it("crosses month and year boundaries", () => {
    expect(dubaiDateISO(new Date("2025-12-31T21:00:00Z"))).toBe("2026-01-01");
    expect(dubaiDateISO(new Date("2026-02-28T22:15:00Z"))).toBe("2026-03-01");
  });
});
