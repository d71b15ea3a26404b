import { z } from "zod";

export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params: Record<string, unknown>;
};

export type JsonRpcErrorObject = { code: number; message: string; data?: unknown };

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
};

export type JsonRpcNotification = {
  jsonrpc: "2.0";
  method: string;
  params: unknown;
};

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;

/** A frame that is not a JSON-RPC 2.0 request at all. */
export class JsonRpcProtocolError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly id: JsonRpcId | null = null,
  ) {
    super(message);
    this.name = "JsonRpcProtocolError";
  }
}

const RequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string()]),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export function parseJsonRpcRequest(raw: string): JsonRpcRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new JsonRpcProtocolError(PARSE_ERROR, "Parse error");
  }

  const result = RequestSchema.safeParse(parsed);
  if (!result.success) {
    const id = RequestSchema.shape.id.safeParse(
      parsed !== null && typeof parsed === "object" && "id" in parsed ? parsed.id : undefined,
    );
    throw new JsonRpcProtocolError(
      INVALID_REQUEST,
      "Invalid Request: missing required fields",
      id.success ? id.data : null,
    );
  }

  return {
    jsonrpc: "2.0",
    id: result.data.id,
    method: result.data.method,
    params: result.data.params ?? {},
  };
}

export function createJsonRpcResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function createJsonRpcError(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: data === undefined ? { code, message } : { code, message, data } };
}

export function createJsonRpcNotification(method: string, params: unknown): JsonRpcNotification {
  return { jsonrpc: "2.0", method, params };
}
