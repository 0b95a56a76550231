/**
 * Date formatting utilities
 */

const pad2 = (n: number) => String(n).padStart(2, "0");

/**
 * Normalises the rendered sale date and time (e.g. "3/5/2024" and
 * "2:07:09 PM") into a local ISO-8601 string without offset
 * ("2024-03-05T14:07:09"). Returns null when the text does not match the
 * listing's month/day/year, 12-hour clock format or names an impossible date.
 */
export function parseSaleTimestamp(text: string): string | null {
  const m =
    /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})\s*([AaPp][Mm])$/.exec(
      text.trim(),
    );
  if (!m) return null;
  const [, mo, d, y, h, mi, s, ampm] = m;
  const month = Number(mo);
  const day = Number(d);
  const year = Number(y);
  let hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (hour < 1 || hour > 12 || minute > 59 || second > 59) return null;
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  const pm = ampm.toUpperCase() === "PM";
  if (hour === 12) hour = pm ? 12 : 0;
  else if (pm) hour += 12;

  return `${year}-${pad2(month)}-${pad2(day)}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}`;
}

/** Compact local stamp used in snapshot file names, e.g. 20240305_140709 */
export function fileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}
