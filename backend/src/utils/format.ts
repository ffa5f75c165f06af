// All timestamps are rendered in UTC.

export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function formatCompactDate(date: Date): string {
  return formatDate(date).replace(/-/g, '');
}

export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/** Postgres returns DECIMAL columns as strings. */
export function parseMoney(value: string | number | null | undefined): number {
  return roundMoney(parseFloat(String(value ?? '0')) || 0);
}
