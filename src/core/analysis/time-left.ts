import { Logger } from "../utils/logger";

/**
 * Minutes left on an auction from texts such as "1h30m", "45m", "2h" or a
 * bare number. "-" and "Very Short" mean 0; anything else unreadable logs a
 * warning and counts as 0.
 */
export function parseTimeLeft(text: string): number {
  const raw = text.trim().toLowerCase();
  if (raw === "-" || raw === "very short") return 0;

  const hours = /(\d+)\s*h/.exec(raw);
  const minutes = /(\d+)\s*m/.exec(raw);
  if (hours || minutes) {
    return (hours ? Number(hours[1]) * 60 : 0) + (minutes ? Number(minutes[1]) : 0);
  }
  if (/^\d+$/.test(raw)) return Number(raw);

  Logger.warn(`Could not parse time left: '${text}'`);
  return 0;
}
