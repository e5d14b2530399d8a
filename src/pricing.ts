import type { CartItem, OrderItem } from './types';

export interface PricingResult {
  items: OrderItem[];
  total: number;
}

/** Prices are snapshots taken when each line was added; no live lookups here. */
export function calculatePricing(items: CartItem[]): PricingResult {
  const orderItems: OrderItem[] = items.map(item => ({
    ...item,
    lineTotal: item.unitPrice * item.quantity,
  }));

  const total = orderItems.reduce((sum, item) => sum + item.lineTotal, 0);

  return { items: orderItems, total };
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const dollars = Math.floor(abs / 100);
  const rest = String(abs % 100).padStart(2, '0');
  return `${sign}$${dollars}.${rest}`;
}

const PRICE_RE = /^\d+(\.\d{1,2})?$/;

/** Parses "12", "12.5" or "12.50" into cents; null for anything else. */
export function parseCents(input: string): number | null {
  const text = input.trim().replace(/^\$/, '');
  if (!PRICE_RE.test(text)) return null;
  const [whole = '0', fraction = ''] = text.split('.');
  return Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
}
