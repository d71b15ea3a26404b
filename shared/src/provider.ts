export type StreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "usage"; input: number; output: number }
  | { type: "stop"; reason: string };

export type LLMMessage = {
  role: "user" | "assistant";
  content: string;
};

export type ResponseFormat = {
  type: "json_object";
  schema?: Record<string, unknown>;
};

export type CreateMessageParams = {
  model: string;
  system?: string;
  messages: LLMMessage[];
  maxTokens: number;
  temperature?: number;
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
};

export type LLMProvider = {
  id: string;
  name: string;
  createMessage(params: CreateMessageParams): AsyncIterable<StreamEvent>;
};
