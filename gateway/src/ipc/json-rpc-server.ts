import { ERROR_CODES } from "@marketlens/shared";
import { GatewayError } from "../errors.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import {
  createJsonRpcError,
  createJsonRpcResponse,
  JsonRpcProtocolError,
  METHOD_NOT_FOUND,
  parseJsonRpcRequest,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./json-rpc.js";

export function gatewayErrorResponse(id: JsonRpcId, err: GatewayError): JsonRpcResponse {
  return createJsonRpcError(id, ERROR_CODES[err.kind], err.message, { kind: err.kind });
}

export type JsonRpcHandler<C> = (params: Record<string, unknown>, context: C) => Promise<unknown>;

/** The frame was not a JSON-RPC request; the peer is not speaking the protocol. */
export type ProtocolRejection = {
  rejection: JsonRpcResponse;
};

/** Method dispatch over raw frames. C is whatever per-caller state handlers need. */
export class JsonRpcServer<C> {
  private handlers = new Map<string, JsonRpcHandler<C>>();
  private log = createLogger("json-rpc");

  register(method: string, handler: JsonRpcHandler<C>): void {
    if (this.handlers.has(method)) {
      throw new Error(`Method already registered: ${method}`);
    }
    this.handlers.set(method, handler);
  }

  listMethods(): string[] {
    return [...this.handlers.keys()];
  }

  /** Split parsing from dispatch so callers can act between the two. */
  parse(raw: string): JsonRpcRequest | ProtocolRejection {
    try {
      return parseJsonRpcRequest(raw);
    } catch (err) {
      if (err instanceof JsonRpcProtocolError) {
        return { rejection: createJsonRpcError(err.id, err.code, err.message) };
      }
      throw err;
    }
  }

  async dispatch(req: JsonRpcRequest, context: C): Promise<JsonRpcResponse> {
    const handler = this.handlers.get(req.method);
    if (!handler) {
      return createJsonRpcError(req.id, METHOD_NOT_FOUND, `Method not found: ${req.method}`);
    }

    try {
      const result = await handler(req.params, context);
      return createJsonRpcResponse(req.id, result);
    } catch (err) {
      return this.errorResponse(req.id, req.method, err);
    }
  }

  private errorResponse(id: JsonRpcId, method: string, err: unknown): JsonRpcResponse {
    if (err instanceof GatewayError) {
      return gatewayErrorResponse(id, err);
    }
    this.log.error("Handler failed", { method, error: errorMessage(err) });
    return createJsonRpcError(id, ERROR_CODES.Internal, "Internal error", { kind: "Internal" });
  }
}
