export type TimeUnit = "m" | "h" | "d" | "w" | "M";

export type Timeframe = {
  value: number;
  unit: TimeUnit;
};

export class TimeframeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeframeError";
  }
}

const UNIT_SECONDS: Record<TimeUnit, number> = {
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
  // Months are approximated as 30 days
  M: 2592000,
};

export const STANDARD_TIMEFRAMES = ["1m", "5m", "15m", "30m", "1h", "4h", "1d", "1w", "1M"] as const;

export type StandardTimeframe = (typeof STANDARD_TIMEFRAMES)[number];

const STANDARD_SET: ReadonlySet<string> = new Set(STANDARD_TIMEFRAMES);

function isTimeUnit(value: string): value is TimeUnit {
  return value in UNIT_SECONDS;
}

/**
 * Parse a timeframe such as "5m", "4h" or "1M". Units are case-sensitive:
 * "m" is minutes and "M" is months.
 */
export function parseTimeframe(input: string): Timeframe {
  const s = input.trim();
  const match = s.match(/^(\d+)([A-Za-z])$/);
  if (!match?.[1] || !match[2]) {
    throw new TimeframeError(`Invalid timeframe format: ${input}`);
  }

  const unit = match[2];
  if (!isTimeUnit(unit)) {
    throw new TimeframeError(`Invalid time unit: ${unit}`);
  }

  const value = Number(match[1]);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new TimeframeError("Timeframe value must be a positive integer");
  }

  return { value, unit };
}

export function formatTimeframe(tf: Timeframe): string {
  return `${tf.value}${tf.unit}`;
}

export function timeframeToSeconds(tf: Timeframe): number {
  return tf.value * UNIT_SECONDS[tf.unit];
}

/** Canonical string form, e.g. " 05m " -> "5m". Throws TimeframeError. */
export function normalizeTimeframe(input: string): string {
  return formatTimeframe(parseTimeframe(input));
}

export function isStandardTimeframe(input: string): input is StandardTimeframe {
  return STANDARD_SET.has(input);
}
