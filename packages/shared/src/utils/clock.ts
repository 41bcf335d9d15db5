export const MS_PER_DAY = 86_400_000;

/** Shift an ISO timestamp by a (possibly fractional) number of days. */
export function addDays(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * MS_PER_DAY).toISOString();
}

/** Elapsed fractional days from `fromIso` to `now`, clamped at zero. */
export function ageInDays(fromIso: string, now: Date): number {
  const elapsed = now.getTime() - Date.parse(fromIso);
  return elapsed > 0 ? elapsed / MS_PER_DAY : 0;
}
