export const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// Calendar date (UTC) in the YYYY-MM-DD form used across the document.
export function toIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

export function todayIsoDate(): string {
  return toIsoDate(new Date());
}
