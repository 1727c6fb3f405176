export function formatMinutes(minutes: number): string {
  const whole = Number.isFinite(minutes) ? Math.max(0, Math.floor(minutes)) : 0;
  if (whole < 60) return `${whole} min`;
  const hrs = Math.floor(whole / 60);
  const mins = whole % 60;
  if (mins === 0) return `${hrs} hr${hrs === 1 ? '' : 's'}`;
  return `${hrs} hr${hrs === 1 ? '' : 's'} ${mins} min`;
}

/** `M:SS` for countdowns. Fractions round up so a running timer never shows 0:00 early. */
export function formatMinutesSeconds(seconds: number): string {
  const total = Number.isFinite(seconds) ? Math.max(0, Math.ceil(seconds)) : 0;
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `${mins}:${String(secs).padStart(2, '0')}`;
}

/** Whole-minute label for estimates: "Less than a minute" under 60 s. */
export function formatDurationEstimate(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 60) return 'Less than a minute';
  return formatMinutes(seconds / 60);
}
