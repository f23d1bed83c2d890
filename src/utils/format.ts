const BYTES_PER_KIB = 1024;

/**
 * Format bytes to human-readable string (binary units, as zfs(8) prints them)
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';

  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(BYTES_PER_KIB)), units.length - 1);
  const value = bytes / Math.pow(BYTES_PER_KIB, i);

  return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i]}`;
}

/**
 * ISO-8601 UTC without milliseconds
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
