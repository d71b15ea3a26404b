import { z } from "zod";

const ServerConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(3000),
  path: z.string().startsWith("/").default("/ws"),
  heartbeatIntervalMs: z.number().int().positive().default(30000),
});

const PrincipalSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
});

const AuthConfigSchema = z.object({
  // token -> principal; the token itself is opaque to the gateway
  tokens: z.record(PrincipalSchema).default({}),
});

const SourceLimitsSchema = z.object({
  capacity: z.number().positive(),
  refillPerSecond: z.number().nonnegative(),
  failureThreshold: z.number().int().positive(),
  cooldownMs: z.number().int().positive(),
});

const FetcherConfigSchema = z.object({
  defaults: SourceLimitsSchema.default({
    capacity: 10,
    refillPerSecond: 5,
    failureThreshold: 5,
    cooldownMs: 30000,
  }),
  sources: z.record(SourceLimitsSchema.partial()).default({}),
});

const CacheConfigSchema = z.object({
  ttlMs: z
    .object({
      technical: z.number().int().positive().default(60000),
      pattern: z.number().int().positive().default(300000),
      sentiment: z.number().int().positive().default(600000),
      marketData: z.number().int().positive().default(5000),
    })
    .default({}),
  sweepIntervalMs: z.number().int().positive().default(60000),
});

const ConnectionConfigSchema = z.object({
  channelCapacity: z.number().int().positive().default(256),
  maxSubscriptions: z.number().int().positive().default(200),
  maxInflight: z.number().int().positive().default(8),
  drainTimeoutMs: z.number().int().positive().default(5000),
});

const AnalysisConfigSchema = z.object({
  defaultDeadlineMs: z.number().int().positive().default(10000),
  maxDeadlineMs: z.number().int().positive().default(60000),
  /** Analyzers share this slice of the request deadline; the rest is left for reasoning. */
  contextBudgetMs: z.number().int().positive().default(5000),
  localBudgetMs: z.number().int().positive().default(3000),
});

const FeaturesConfigSchema = z.object({
  technical: z.boolean().default(true),
  pattern: z.boolean().default(true),
  sentiment: z.boolean().default(true),
  realTimeUpdates: z.boolean().default(true),
});

const FeedScheduleSchema = z.object({
  sourceId: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
  timeframe: z.string().min(1).default("1m"),
  intervalMs: z.number().int().positive().default(60000),
  enabled: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  fetcher: FetcherConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  connection: ConnectionConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
  features: FeaturesConfigSchema.default({}),
  feeds: z.array(FeedScheduleSchema).default([]),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceLimits = z.infer<typeof SourceLimitsSchema>;
export type FeedSchedule = z.infer<typeof FeedScheduleSchema>;
export type Principal = z.infer<typeof PrincipalSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}
