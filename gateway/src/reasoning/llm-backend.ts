import type { ContextBundle, InsightDraft, LLMProvider } from "@marketlens/shared";
import type { ReasoningBackend } from "../analysis/types.js";
import type { Deadline } from "../utils/deadline.js";
import { parseInsight } from "./insight-parser.js";
import { buildInsightPrompt } from "./prompt-builder.js";

export type LlmReasoningBackendOptions = {
  id: string;
  provider: LLMProvider;
  model: string;
  maxTokens?: number;
  temperature?: number;
};

/** Reasoning backend that prompts a streaming LLM provider and parses its JSON answer. */
export class LlmReasoningBackend implements ReasoningBackend {
  readonly id: string;
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: LlmReasoningBackendOptions) {
    this.id = options.id;
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0.2;
  }

  async infer(bundle: ContextBundle, deadline: Deadline): Promise<InsightDraft> {
    const prompt = buildInsightPrompt(bundle);

    let text = "";
    const stream = this.provider.createMessage({
      model: this.model,
      system: prompt.system,
      messages: prompt.messages,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      responseFormat: prompt.responseFormat,
      signal: deadline.signal,
    });

    for await (const event of stream) {
      deadline.signal.throwIfAborted();
      if (event.type === "text_delta") {
        text += event.text;
      }
    }

    return parseInsight(text);
  }
}
