import { StatFormat } from '../stats/stat-definitions';

export const MISSING_VALUE_TEXT = 'N/A';

export function formatStatValue(format: StatFormat, value: number | null): string {
  if (value === null || !Number.isFinite(value)) return MISSING_VALUE_TEXT;

  switch (format) {
    case 'integer':
      return String(Math.round(value));
    case 'decimal':
      return value.toFixed(1);
    case 'percent':
      return `${(value * 100).toFixed(1)}%`;
    case 'signed': {
      const rounded = Math.round(value * 10) / 10;
      if (rounded === 0) return '0.0';
      return rounded > 0 ? `+${rounded.toFixed(1)}` : rounded.toFixed(1);
    }
  }
}

/** 1 -> "1st", 12 -> "12th", 23 -> "23rd" */
export function ordinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}
