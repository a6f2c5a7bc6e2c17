/**
 * Date stamps used in generated documents and backup names (local time).
 */

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DD` */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `YYYYMMDD_HHMMSS`, sortable */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
