import { calculatePricing, formatCents, parseCents } from '../src/pricing';
import type { CartItem } from '../src/types';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

// 1000×2 + 500×1 = 2500
const ITEMS: CartItem[] = [
  { lineId: 'TICKET:P01:2030-01-02', kind: 'TICKET', referenceId: 'P01', name: 'Bako', unitPrice: 1000, quantity: 2, visitDate: '2030-01-02' },
  { lineId: 'MERCHANDISE:SKU001', kind: 'MERCHANDISE', referenceId: 'SKU001', name: 'Mug', unitPrice: 500, quantity: 1 },
];

// ---------------------------------------------------------------------------
// calculatePricing
// ---------------------------------------------------------------------------

test('line totals are unit price × quantity and total is their sum', () => {
  const result = calculatePricing(ITEMS);

  expect(result.items.map(item => item.lineTotal)).toEqual([2000, 500]);
  expect(result.total).toBe(2500);
});

test('keeps every cart field on the order lines', () => {
  const [ticket] = calculatePricing(ITEMS).items;

  expect(ticket).toEqual({ ...ITEMS[0], lineTotal: 2000 });
});

test('empty list prices to zero', () => {
  expect(calculatePricing([])).toEqual({ items: [], total: 0 });
});

// ---------------------------------------------------------------------------
// formatCents / parseCents
// ---------------------------------------------------------------------------

test.each([
  [0, '$0.00'],
  [5, '$0.05'],
  [2500, '$25.00'],
  [123456, '$1234.56'],
  [-750, '-$7.50'],
])('formatCents(%d) → %s', (cents, expected) => {
  expect(formatCents(cents)).toBe(expected);
});

test.each([
  ['12', 1200],
  ['12.5', 1250],
  ['12.50', 1250],
  ['$0.99', 99],
  ['  7 ', 700],
])('parseCents(%j) → %d', (input, expected) => {
  expect(parseCents(input)).toBe(expected);
});

test.each(['', 'abc', '-1', '1.234', '1,50'])('parseCents(%j) → null', input => {
  expect(parseCents(input)).toBeNull();
});
