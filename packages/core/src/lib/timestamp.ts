/**
 * Local-time timestamp in the orchestrator's format:
 * `YYYY-MM-DDTHH:mm:ss.SSSSSS` (microseconds, padded from milliseconds).
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}000`
  );
}
