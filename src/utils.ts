export const MEGABYTE = 1024 * 1024;

export function normalizePrefix(prefix: string): string {
  if (!prefix) return '';
  return prefix.endsWith('/') ? prefix : prefix + '/';
}

/** Turns a host path into the remote key convention (forward slashes). */
export function toRemoteKey(path: string): string {
  return path.replace(/\\/g, '/');
}

export function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

export function formatSize(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let idx = 0;
  let num = bytes;

  while (num >= 1024 && idx < units.length - 1) {
    num /= 1024;
    idx++;
  }

  return `${num.toFixed(2)} ${units[idx]}`;
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
