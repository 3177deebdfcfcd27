const pad = (n: number) => String(n).padStart(2, '0');

/** YYYY-MM-DD, local time */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** HHMMSS, local time */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** YYYY-MM-DD HH:MM:SS, local time */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** YYYYMMDD_HHMMSS, local time */
export function formatStamp(date: Date): string {
  return `${formatDate(date).replace(/-/g, '')}_${formatClock(date)}`;
}
