const MAX_NAME_LENGTH = 20;

/** 0.4237 → "42.4%" */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** Gridline label: whole percent. 0.06 → "6%" */
export function formatGridLabel(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/** Unix seconds → "JUNE 09, 2024" (UTC). */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000)
    .toLocaleDateString('en-US', {
      month: 'long',
      day: '2-digit',
      year: 'numeric',
      timeZone: 'UTC',
    })
    .toUpperCase();
}

/** Upper-cased, cut to 20 characters. */
export function formatSeriesName(name: string): string {
  return Array.from(name.toUpperCase()).slice(0, MAX_NAME_LENGTH).join('');
}
