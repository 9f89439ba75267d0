/**
 * mysql-advisor - Human-readable Formatting
 *
 * Byte sizes, counts, uptimes and percentages as they appear in the report.
 */

const KIB = 1024;
const MIB = 1024 ** 2;
const GIB = 1024 ** 3;

/**
 * Round half away from zero to one decimal place
 */
export function roundToTenth(value: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
}

/**
 * Bytes scaled to G/M/K with one decimal (e.g. "16.0M"); plain bytes below 1K
 */
export function formatBytes(bytes: number): string {
  if (bytes >= GIB) return `${(bytes / GIB).toFixed(1)}G`;
  if (bytes >= MIB) return `${(bytes / MIB).toFixed(1)}M`;
  if (bytes >= KIB) return `${(bytes / KIB).toFixed(1)}K`;
  return `${bytes}B`;
}

/**
 * Bytes scaled to G/M/K, truncated to a whole number (e.g. "64M")
 */
export function formatBytesRounded(bytes: number): string {
  if (bytes >= GIB) return `${Math.trunc(bytes / GIB)}G`;
  if (bytes >= MIB) return `${Math.trunc(bytes / MIB)}M`;
  if (bytes >= KIB) return `${Math.trunc(bytes / KIB)}K`;
  return `${bytes}B`;
}

/**
 * Counts scaled by powers of 1000 and truncated (B/M/K)
 */
export function formatCount(value: number): string {
  if (value >= 1000 ** 3) return `${Math.trunc(value / 1000 ** 3)}B`;
  if (value >= 1000 ** 2) return `${Math.trunc(value / 1000 ** 2)}M`;
  if (value >= 1000) return `${Math.trunc(value / 1000)}K`;
  return String(value);
}

/**
 * Queries per second: three decimals below 1000, scaled above
 */
export function formatRate(perSecond: number): string {
  return perSecond >= 1000 ? formatCount(perSecond) : perSecond.toFixed(3);
}

/**
 * One-decimal percentage value without the sign (e.g. "80.0")
 */
export function formatTenth(value: number): string {
  return roundToTenth(value).toFixed(1);
}

/**
 * Uptime as "1d 2h 3m 4s", dropping leading zero units
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = totalSeconds % 60;
  const minutes = Math.trunc((totalSeconds % 3600) / 60);
  const hours = Math.trunc((totalSeconds % 86400) / 3600);
  const days = Math.trunc(totalSeconds / 86400);

  if (days > 0) return `${days}d ${hours}h ${minutes}m ${seconds}s`;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}
