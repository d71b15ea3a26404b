export type ErrorKind =
  | "RateLimited"
  | "CircuitOpen"
  | "Timeout"
  | "NoContext"
  | "DeadlineExceeded"
  | "AuthFailed"
  | "Disconnected"
  | "Unavailable"
  | "InvalidRequest"
  | "Internal";

/** What a client is allowed to see about a failure. */
export type ClientError = {
  kind: ErrorKind;
  message: string;
};

// JSON-RPC error codes; -32000..-32099 is the implementation-defined range
export const ERROR_CODES: Record<ErrorKind, number> = {
  RateLimited: -32001,
  CircuitOpen: -32002,
  Timeout: -32003,
  NoContext: -32004,
  DeadlineExceeded: -32005,
  AuthFailed: -32006,
  Disconnected: -32007,
  Unavailable: -32008,
  InvalidRequest: -32602,
  Internal: -32603,
};
