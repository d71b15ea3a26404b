import { describe, it, expect } from "vitest";
import type { ContextBundle } from "@marketlens/shared";
import { buildInsightPrompt } from "../prompt-builder.js";

function makeBundle(overrides: Partial<ContextBundle> = {}): ContextBundle {
  return {
    requestId: "req-1",
    symbols: ["EURUSD"],
    timeframe: "1h",
    slots: [
      { kind: "technical", symbol: "EURUSD", status: "ok", data: { rsi: 61 }, cached: false, latencyMs: 12 },
    ],
    complete: true,
    assembledAt: 0,
    ...overrides,
  };
}

describe("buildInsightPrompt", () => {
  it("lists the symbols, timeframe and each analyzer output", () => {
    const prompt = buildInsightPrompt(makeBundle());
    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0]?.role).toBe("user");
    expect(prompt.messages[0]?.content).toBe(
      ["Symbols: EURUSD", "Timeframe: 1h", "", "## Analyzer outputs", '- [technical] EURUSD: {"rsi":61}'].join("\n"),
    );
    expect(prompt.responseFormat).toEqual({ type: "json_object" });
  });

  it("marks failed slots and notes incomplete context", () => {
    const prompt = buildInsightPrompt(
      makeBundle({
        complete: false,
        slots: [
          {
            kind: "sentiment",
            symbol: "EURUSD",
            status: "error",
            error: { kind: "Timeout", message: "analyzer:sentiment call timed out" },
            latencyMs: 1000,
          },
        ],
      }),
    );
    const content = prompt.messages[0]?.content ?? "";
    expect(content.split("\n")).toContain("- [sentiment] EURUSD: unavailable (Timeout)");
    expect(content.endsWith("Note: the context is incomplete.")).toBe(true);
  });

  it("truncates oversized analyzer data", () => {
    const prompt = buildInsightPrompt(
      makeBundle({
        slots: [
          { kind: "pattern", symbol: "EURUSD", status: "ok", data: "x".repeat(5000), cached: false, latencyMs: 1 },
        ],
      }),
    );
    const line = (prompt.messages[0]?.content ?? "").split("\n").at(-1) ?? "";
    expect(line).toBe(`- [pattern] EURUSD: "${"x".repeat(1999)}...`);
  });

  it("asks for fenced JSON in the system prompt", () => {
    expect(buildInsightPrompt(makeBundle()).system).toContain("Wrap the JSON object in ```json code fences.");
  });
});
