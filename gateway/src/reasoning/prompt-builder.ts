import type { ContextBundle, ContextSlot, LLMMessage, ResponseFormat } from "@marketlens/shared";

export type InsightPrompt = {
  system: string;
  messages: LLMMessage[];
  responseFormat: ResponseFormat;
};

const MAX_SLOT_CHARS = 2000;

const SYSTEM_PROMPT = [
  `You are a market analysis assistant. Combine the analyzer outputs below into one insight.`,
  ``,
  `Respond with a single JSON object with these fields:`,
  `- summary: one or two sentences`,
  `- recommendation: "strong_buy" | "buy" | "hold" | "sell" | "strong_sell" | "no_recommendation"`,
  `- confidence: a number from 0.0 to 1.0`,
  `- reasoning: an array of short strings, one per supporting point`,
  `- riskFactors: an array of short strings`,
  ``,
  `Some analyzers may be marked unavailable. Base the insight only on the data present and lower your confidence accordingly.`,
  ``,
  `IMPORTANT: Wrap the JSON object in \`\`\`json code fences.`,
].join("\n");

function formatSlot(slot: ContextSlot): string {
  if (slot.status === "error") {
    return `- [${slot.kind}] ${slot.symbol}: unavailable (${slot.error.kind})`;
  }
  let data = JSON.stringify(slot.data) ?? "null";
  if (data.length > MAX_SLOT_CHARS) {
    data = `${data.slice(0, MAX_SLOT_CHARS)}...`;
  }
  return `- [${slot.kind}] ${slot.symbol}: ${data}`;
}

export function buildInsightPrompt(bundle: ContextBundle): InsightPrompt {
  const lines: string[] = [
    `Symbols: ${bundle.symbols.join(", ")}`,
    `Timeframe: ${bundle.timeframe}`,
    ``,
    `## Analyzer outputs`,
    ...bundle.slots.map(formatSlot),
  ];

  if (!bundle.complete) {
    lines.push(``, `Note: the context is incomplete.`);
  }

  return {
    system: SYSTEM_PROMPT,
    messages: [{ role: "user", content: lines.join("\n") }],
    responseFormat: { type: "json_object" },
  };
}
