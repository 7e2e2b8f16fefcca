const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const pad = (value: number, width: number): string => String(value).padStart(width, "0");

/**
 * Render an elapsed time as `timer.duration` stores it:
 * `H:MM:SS`, `H:MM:SS.ffffff` with a sub-second part, and a `N day(s), ` prefix.
 * Negative spans (clock skew) are clamped to zero.
 */
export function formatElapsed(ms: number): string {
  let remaining = Math.max(0, Math.round(ms));

  const days = Math.floor(remaining / MS_PER_DAY);
  remaining %= MS_PER_DAY;
  const hours = Math.floor(remaining / MS_PER_HOUR);
  remaining %= MS_PER_HOUR;
  const minutes = Math.floor(remaining / MS_PER_MINUTE);
  remaining %= MS_PER_MINUTE;
  const seconds = Math.floor(remaining / MS_PER_SECOND);
  const millis = remaining % MS_PER_SECOND;

  let clock = `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}`;
  if (millis > 0) {
    clock += `.${pad(millis * 1000, 6)}`;
  }
  if (days > 0) {
    return `${days} ${days === 1 ? "day" : "days"}, ${clock}`;
  }
  return clock;
}
