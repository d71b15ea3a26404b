import { z } from "zod";
import type { InsightDraft } from "@marketlens/shared";

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

const InsightDraftSchema = z.object({
  summary: z.string().min(1),
  recommendation: z
    .enum(["strong_buy", "buy", "hold", "sell", "strong_sell", "no_recommendation"])
    .catch("no_recommendation"),
  confidence: z.number().transform((n) => Math.min(1, Math.max(0, n))),
  reasoning: z.array(z.string()).default([]),
  riskFactors: z.array(z.string()).default([]),
});

function extractJson(text: string): string {
  const fenceMatch = text.match(/```json\s*([\s\S]*?)```/);
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim();
  }

  const objectMatch = text.match(/\{[\s\S]*\}/);
  if (objectMatch?.[0]) {
    return objectMatch[0];
  }

  throw new ParseError("No JSON object found in response");
}

export function parseInsight(text: string): InsightDraft {
  const jsonStr = extractJson(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    throw new ParseError(`Invalid JSON: ${jsonStr.slice(0, 100)}`);
  }

  const result = InsightDraftSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ParseError(`Invalid insight: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  return result.data;
}
