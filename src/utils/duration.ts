/**
 * Human-readable durations: "394.823µs", "1.5ms", "2s", "1m30s", "1h0m0s"
 */

const NS_PER_US = 1_000n;
const NS_PER_MS = 1_000_000n;
const NS_PER_S = 1_000_000_000n;
const NS_PER_MIN = 60n * NS_PER_S;
const NS_PER_HOUR = 60n * NS_PER_MIN;

// whole.fraction with trailing zeros dropped
const scaled = (value: bigint, unit: bigint): string => {
  const whole = value / unit;
  const rest = value % unit;
  if (rest === 0n) {
    return whole.toString();
  }
  const digits = unit.toString().length - 1;
  const fraction = rest.toString().padStart(digits, "0").replace(/0+$/, "");
  return `${whole}.${fraction}`;
};

export const formatDuration = (ns: bigint): string => {
  if (ns === 0n) {
    return "0s";
  }

  const sign = ns < 0n ? "-" : "";
  const abs = ns < 0n ? -ns : ns;

  if (abs < NS_PER_US) {
    return `${sign}${abs}ns`;
  }
  if (abs < NS_PER_MS) {
    return `${sign}${scaled(abs, NS_PER_US)}µs`;
  }
  if (abs < NS_PER_S) {
    return `${sign}${scaled(abs, NS_PER_MS)}ms`;
  }

  const hours = abs / NS_PER_HOUR;
  const minutes = (abs % NS_PER_HOUR) / NS_PER_MIN;
  const seconds = `${scaled(abs % NS_PER_MIN, NS_PER_S)}s`;

  if (hours > 0n) {
    return `${sign}${hours}h${minutes}m${seconds}`;
  }
  if (minutes > 0n) {
    return `${sign}${minutes}m${seconds}`;
  }
  return `${sign}${seconds}`;
};

/**
 * Whole milliseconds, truncated
 */
export const toMilliseconds = (ns: bigint): number => Number(ns / NS_PER_MS);
