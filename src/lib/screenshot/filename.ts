/**
 * Screenshot file naming and PNG sniffing.
 */

/** First eight bytes of every PNG file */
export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time as `YYYYMMDD_HHMMSS`
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * `<prefix>_<YYYYMMDD_HHMMSS>.png`
 *
 * Second precision only: two captures with the same prefix in the same
 * second get the same name.
 */
export function buildTimestampedFilename(prefix: string, date: Date): string {
  return `${prefix}_${formatTimestamp(date)}.png`;
}

export function isPng(data: Uint8Array): boolean {
  if (data.length <= PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((byte, i) => data[i] === byte);
}
