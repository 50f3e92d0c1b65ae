/** Source of "now", injected so dates in slugs and metadata are testable */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local calendar date as YYYY-MM-DD */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local calendar date as YYYYMMDD */
export function compactDate(date: Date): string {
  return isoDate(date).replace(/-/g, "");
}
