/**
 * Formatting utilities for CLI output
 * Handles byte sizes, truncation, number formatting
 */

/**
 * Format bytes to human-readable string (KB, MB, GB)
 */
export function formatBytes(bytes: number, decimals: number = 1): string {
  if (bytes <= 0) return '0 B';

  const k = 1024;
  const dm = decimals < 0 ? 0 : decimals;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return parseFloat((bytes / Math.pow(k, i)).toFixed(dm)) + ' ' + sizes[i];
}

/**
 * Format a response time in seconds; '-' when unknown
 */
export function formatDuration(seconds: number | null): string {
  if (seconds === null) return '-';

  const ms = Math.round(seconds * 1000);
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.floor(seconds % 60)}s`;
}

/**
 * Format number with thousands separator
 */
export function formatNumber(num: number): string {
  return num.toLocaleString('en-US');
}

/**
 * Truncate string with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 1) + '…';
}

/**
 * Format a similarity score as percentage
 */
export function formatScore(score: number): string {
  return (score * 100).toFixed(1) + '%';
}

/**
 * Epoch seconds as an ISO-8601 string (UTC)
 */
export function formatTimestamp(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/**
 * Format relative time (e.g., "2m ago")
 */
export function formatRelativeTime(epochSeconds: number, nowSeconds: number = Date.now() / 1000): string {
  const diffSeconds = Math.max(0, Math.floor(nowSeconds - epochSeconds));

  if (diffSeconds < 60) {
    return `${diffSeconds}s ago`;
  }

  const diffMinutes = Math.floor(diffSeconds / 60);
  if (diffMinutes < 60) {
    return `${diffMinutes}m ago`;
  }

  const diffHours = Math.floor(diffMinutes / 60);
  if (diffHours < 24) {
    return `${diffHours}h ago`;
  }

  return `${Math.floor(diffHours / 24)}d ago`;
}
