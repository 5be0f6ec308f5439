/**
 * Format bytes to human-readable size
 * Example: 1900000000 → "1.8 GB"
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Local timestamp used in the usage log
 * Example: "2025-11-20 10:30:05"
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Compact local date stamp
 * Example: "20251120"
 */
export function formatDateStamp(date: Date = new Date()): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

/**
 * Compact local date-time stamp used in backup names
 * Example: "20251120-103005"
 */
export function formatDateTimeStamp(date: Date = new Date()): string {
  return `${formatDateStamp(date)}-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}

/**
 * ISO-8601 UTC without milliseconds
 * Example: "2025-11-20T09:30:05Z"
 */
export function formatIsoSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

export function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}
