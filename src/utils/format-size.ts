const UNITS = ['', 'Ki', 'Mi', 'Gi', 'Ti', 'Pi', 'Ei', 'Zi'];

/**
 * Human readable byte size with binary units, truncating at each step:
 * 1023 => "1023B", 1536 => "1KiB".
 */
export function formatSize(bytes: number): string {
  let value = Math.max(0, Math.floor(bytes));
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value}${unit}B`;
    }
    value = Math.floor(value / 1024);
  }
  return `${value}YiB`;
}
