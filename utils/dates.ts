export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export function daysBefore(date: Date, days: number): string {
  const shifted = new Date(date.getTime());
  shifted.setUTCDate(shifted.getUTCDate() - days);
  return toIsoDate(shifted);
}

export function monthsBefore(date: Date, months: number): string {
  const shifted = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() - months, 1));
  return toIsoDate(shifted);
}
