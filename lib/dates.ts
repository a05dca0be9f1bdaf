// Calendar dates travel as YYYY-MM-DD and are stored as UTC midnight.

export function toCalendarDate(value: Date): string;
export function toCalendarDate(value: Date | null | undefined): string | null;
export function toCalendarDate(value: Date | null | undefined) {
  if (!value) return null;
  return new Date(value).toISOString().slice(0, 10);
}

export function fromCalendarDate(value: string): Date;
export function fromCalendarDate(value: string | null): Date | null;
export function fromCalendarDate(value: string | null) {
  if (value === null) return null;
  return new Date(`${value}T00:00:00.000Z`);
}
