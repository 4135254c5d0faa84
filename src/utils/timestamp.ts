/**
 * Local-time stamps for diagnostic file names, e.g. 20261019_060512
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function fileTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
