export type CircuitState = "closed" | "open" | "half_open";

export type SourceHealthStatus = "healthy" | "degraded" | "offline";

export type SourceHealth = {
  sourceId: string;
  status: SourceHealthStatus;
  circuit: CircuitState;
  tokens: number;
  lastSuccess: number;
  lastFailure?: number;
  failCount: number;
  latencyMs: number;
};
