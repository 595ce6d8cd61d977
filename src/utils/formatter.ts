/**
 * Format file size in bytes to a human-readable string
 */
export function formatSize(bytes: number): string {
    if (bytes === 0) return '0 B';
    
    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
    
    return `${(bytes / Math.pow(1024, i)).toFixed(2)} ${units[i]}`;
  }
  
  /**
   * Format milliseconds to a human-readable duration, dropping a zero
   * trailing seconds part ("5m" rather than "5m 0s")
   */
  export function formatTime(ms: number): string {
    if (ms === 0) return '0s';
    
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const secondsPart = seconds % 60 ? ` ${seconds % 60}s` : '';
    
    if (hours > 0) {
      return `${hours}h ${minutes % 60}m${secondsPart}`;
    } else if (minutes > 0) {
      return `${minutes}m${secondsPart}`;
    } else {
      return `${seconds}s`;
    }
  }
