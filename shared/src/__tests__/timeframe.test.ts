import { describe, it, expect } from "vitest";
import {
  parseTimeframe,
  formatTimeframe,
  timeframeToSeconds,
  normalizeTimeframe,
  isStandardTimeframe,
  TimeframeError,
} from "../timeframe.js";
import { isValidSymbol, normalizeSymbol, SymbolError } from "../symbol.js";

describe("timeframes", () => {
  it("parses standard timeframes", () => {
    expect(parseTimeframe("1m")).toEqual({ value: 1, unit: "m" });
    expect(parseTimeframe("4h")).toEqual({ value: 4, unit: "h" });
    expect(parseTimeframe("1M")).toEqual({ value: 1, unit: "M" });
  });

  it("distinguishes minutes from months", () => {
    expect(timeframeToSeconds(parseTimeframe("1m"))).toBe(60);
    expect(timeframeToSeconds(parseTimeframe("1M"))).toBe(2592000);
  });

  it("computes seconds for custom timeframes", () => {
    expect(timeframeToSeconds(parseTimeframe("2h"))).toBe(7200);
    expect(timeframeToSeconds(parseTimeframe("3d"))).toBe(259200);
    expect(timeframeToSeconds(parseTimeframe("1w"))).toBe(604800);
  });

  it("round-trips through format", () => {
    expect(formatTimeframe({ value: 15, unit: "m" })).toBe("15m");
    expect(normalizeTimeframe(" 015m ")).toBe("15m");
  });

  it("rejects zero values", () => {
    expect(() => parseTimeframe("0h")).toThrow(TimeframeError);
  });

  it("rejects unknown units", () => {
    expect(() => parseTimeframe("5y")).toThrow("Invalid time unit: y");
  });

  it("rejects malformed input", () => {
    expect(() => parseTimeframe("h")).toThrow("Invalid timeframe format: h");
    expect(() => parseTimeframe("1.5h")).toThrow(TimeframeError);
  });

  it("recognizes standard timeframes", () => {
    expect(isStandardTimeframe("15m")).toBe(true);
    expect(isStandardTimeframe("2h")).toBe(false);
  });
});

describe("symbols", () => {
  it("accepts alphanumerics, dots and dashes", () => {
    expect(isValidSymbol("BRK.B")).toBe(true);
    expect(isValidSymbol("BTC-USD")).toBe(true);
  });

  it("rejects empty and overlong symbols", () => {
    expect(isValidSymbol("")).toBe(false);
    expect(isValidSymbol("A".repeat(21))).toBe(false);
  });

  it("normalizes to upper case", () => {
    expect(normalizeSymbol(" eurusd ")).toBe("EURUSD");
  });

  it("throws SymbolError on invalid symbols", () => {
    expect(() => normalizeSymbol("EUR/USD")).toThrow(SymbolError);
  });
});
