export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Format bytes to a short human-readable string, 1024 base.
 * @example formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let i = 0;
  while (value >= 1024 && i < units.length - 1) {
    value /= 1024;
    i++;
  }
  return `${value.toFixed(1)} ${units[i]}`;
}

/**
 * Format a token count with K/M/B suffixes, 1000 base.
 * @example formatTokens(12_345) // "12.3K"
 */
export function formatTokens(tokens: number): string {
  if (tokens < 1000) {
    return `${tokens}`;
  }
  const units = ['K', 'M', 'B'];
  let value = tokens / 1000;
  let i = 0;
  while (value >= 1000 && i < units.length - 1) {
    value /= 1000;
    i++;
  }
  return `${value.toFixed(1)}${units[i]}`;
}
