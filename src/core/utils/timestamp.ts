function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYYMMDD-HHmmss`, used for formats backups
 */
export function compactStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Local time as `YYYY-MM-DD-HHmmss`, used for conflict backups
 */
export function dashedStamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
