/**
 * Byte and duration formatting for reports
 */
export class SizeCalculator {
  private static readonly UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB'];

  /**
   * Format bytes to a human readable string in decimal (SI) units
   */
  static formatBytes(bytes: number): string {
    if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';

    const k = 1000;
    let value = bytes;
    let unitIndex = 0;

    while (value >= k && unitIndex < SizeCalculator.UNITS.length - 1) {
      value /= k;
      unitIndex++;
    }

    return parseFloat(value.toFixed(2)) + ' ' + SizeCalculator.UNITS[unitIndex];
  }

  /**
   * Format milliseconds as seconds with two decimals
   */
  static formatDuration(milliseconds: number): string {
    return `${(Math.max(0, milliseconds) / 1000).toFixed(2)}s`;
  }

  /**
   * Sum the reclaimed size of a set of removals
   */
  static totalBytes(items: ReadonlyArray<{ bytesReclaimed: number }>): number {
    return items.reduce((total, item) => total + item.bytesReclaimed, 0);
  }
}
