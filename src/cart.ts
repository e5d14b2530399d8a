import { InvalidQuantityError, InvalidVisitDateError, OutOfStockError } from './errors';
import { calculatePricing } from './pricing';
import type { Cart, CartItem, CatalogEntry, CatalogRef } from './types';

const VISIT_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function emptyCart(customerId: string): Cart {
  return { customerId, items: [] };
}

export function lineIdFor(ref: CatalogRef, visitDate?: string): string {
  const base = `${ref.kind}:${ref.referenceId}`;
  return visitDate === undefined ? base : `${base}:${visitDate}`;
}

export function sameReference(a: CatalogRef, b: CatalogRef): boolean {
  return a.kind === b.kind && a.referenceId === b.referenceId;
}

/** Quantity already held for a reference, across every visit date. */
export function quantityInCart(cart: Cart, ref: CatalogRef): number {
  return cart.items
    .filter(item => sameReference(item, ref))
    .reduce((sum, item) => sum + item.quantity, 0);
}

export function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new InvalidQuantityError(quantity);
  }
}

/** Visit dates are calendar dates (UTC) strictly after today. */
export function assertVisitDate(visitDate: string | undefined, now: Date): string {
  if (visitDate === undefined || !VISIT_DATE_RE.test(visitDate)) {
    throw new InvalidVisitDateError(visitDate ?? '');
  }
  const parsed = new Date(`${visitDate}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== visitDate) {
    throw new InvalidVisitDateError(visitDate);
  }
  if (visitDate <= now.toISOString().slice(0, 10)) {
    throw new InvalidVisitDateError(visitDate);
  }
  return visitDate;
}

/**
 * Adds `quantity` of a catalog entry, merging into the line for the same
 * reference and visit date. A merged line keeps its first price snapshot.
 * The input cart is never modified.
 */
export function addLine(cart: Cart, entry: CatalogEntry, quantity: number, visitDate?: string): Cart {
  assertQuantity(quantity);

  const requested = quantityInCart(cart, entry) + quantity;
  if (requested > entry.stock) {
    throw new OutOfStockError(entry.referenceId, requested, entry.stock);
  }

  const lineId = lineIdFor(entry, visitDate);
  const existing = cart.items.find(item => item.lineId === lineId);
  if (existing) {
    return {
      ...cart,
      items: cart.items.map(item =>
        item.lineId === lineId ? { ...item, quantity: item.quantity + quantity } : item
      ),
    };
  }

  const line: CartItem = {
    lineId,
    kind: entry.kind,
    referenceId: entry.referenceId,
    name: entry.name,
    unitPrice: entry.price,
    quantity,
    ...(visitDate === undefined ? {} : { visitDate }),
  };
  return { ...cart, items: [...cart.items, line] };
}

/**
 * Takes `quantity` off a line, dropping it when nothing is left; without a
 * quantity the whole line goes. Removing a line that is not in the cart
 * returns the cart unchanged.
 */
export function removeLine(cart: Cart, lineId: string, quantity?: number): Cart {
  const line = cart.items.find(item => item.lineId === lineId);
  if (!line) return cart;
  if (quantity !== undefined) assertQuantity(quantity);

  if (quantity === undefined || quantity >= line.quantity) {
    return { ...cart, items: cart.items.filter(item => item.lineId !== lineId) };
  }
  return {
    ...cart,
    items: cart.items.map(item => (item.lineId === lineId ? { ...item, quantity: item.quantity - quantity } : item)),
  };
}

export function cartTotal(cart: Cart): number {
  return calculatePricing(cart.items).total;
}

export function itemCount(cart: Cart): number {
  return cart.items.reduce((sum, item) => sum + item.quantity, 0);
}
