/**
 * Duration and time-of-day helpers for worklog input and output.
 */

const DURATION_TOKEN = /(\d+(?:\.\d+)?)\s*(h|m)?/g;

/**
 * Format seconds as "2h 5m", or "45m" under an hour.
 */
export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/**
 * Parse "2h 30m", "1h30m", "1.5h", "90m" or a bare number of minutes into
 * seconds. Returns null when the text is not a duration.
 */
export function parseDuration(input: string): number | null {
  const text = input.trim().toLowerCase().replace(/,/g, ' ');
  // Anything left after removing the amounts means the text is not a duration
  if (!text || text.replace(DURATION_TOKEN, '').trim() !== '') {return null;}

  let total = 0;
  for (const match of text.matchAll(DURATION_TOKEN)) {
    const amount = Number(match[1]);
    const unit = match[2] ?? 'm';
    total += unit === 'h' ? amount * 3600 : amount * 60;
  }
  return Math.round(total);
}

/**
 * Tempo expects HH:MM:SS; accept HH:MM as well.
 */
export function normalizeStartTime(time: string): string {
  return time.length === 5 ? `${time}:00` : time;
}
