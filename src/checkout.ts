import { randomUUID } from 'crypto';
import type { AuditLog } from './audit';
import { addLine, assertQuantity, assertVisitDate, emptyCart, removeLine, sameReference } from './cart';
import { kindLabel, loadCatalogEntry, stockAdjustment } from './catalog';
import {
  BaseError,
  EmptyCartError,
  NotFoundError,
  OutOfStockError,
  PersistenceError,
  ValidationError,
  persisting,
} from './errors';
import { describeError, silentLogger, type Logger } from './logger';
import { calculatePricing, formatCents } from './pricing';
import { ConditionFailedError, type DocumentStore, type WriteOperation } from './repository';
import type { Cart, CatalogRef, CheckoutResult, Order, Ticket } from './types';

export interface CheckoutDependencies {
  store: DocumentStore;
  audit: AuditLog;
  log?: Logger;
  now?: () => Date;
  newId?: () => string;
}

interface Demand {
  ref: CatalogRef;
  quantity: number;
}

/** Total quantity per catalog entry, in first-seen order. */
function demandOf(cart: Cart): Demand[] {
  const demand: Demand[] = [];
  for (const item of cart.items) {
    const existing = demand.find(d => sameReference(d.ref, item));
    if (existing) {
      existing.quantity += item.quantity;
    } else {
      demand.push({ ref: { kind: item.kind, referenceId: item.referenceId }, quantity: item.quantity });
    }
  }
  return demand;
}

export class CheckoutEngine {
  private readonly store: DocumentStore;
  private readonly audit: AuditLog;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(deps: CheckoutDependencies) {
    this.store = deps.store;
    this.audit = deps.audit;
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  /**
   * Puts `quantity` of a park ticket or merchandise item in the cart at its
   * current price. Ticket lines need a visit date after today; it is ignored
   * for merchandise. On failure the caller's cart is untouched.
   */
  async addItem(cart: Cart, ref: CatalogRef, quantity: number, visitDate?: string): Promise<Cart> {
    assertQuantity(quantity);
    const date = ref.kind === 'TICKET' ? assertVisitDate(visitDate, this.now()) : undefined;

    const entry = await persisting('load catalog entry', () => loadCatalogEntry(this.store, ref));
    if (!entry) {
      throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
    }

    const updated = addLine(cart, entry, quantity, date);
    this.log({ level: 'debug', action: 'cart.add', customerId: cart.customerId, referenceId: ref.referenceId, quantity });
    return updated;
  }

  /** Takes `quantity` off a line, or the whole line when omitted. Absent lines are a no-op. */
  removeItem(cart: Cart, lineId: string, quantity?: number): Cart {
    return removeLine(cart, lineId, quantity);
  }

  async checkout(cart: Cart, customerId: string): Promise<CheckoutResult> {
    const start = Date.now();
    this.log({ level: 'info', action: 'checkout.start', customerId, lines: cart.items.length });

    try {
      // 1. Reject foreign and empty carts before touching the store
      if (cart.customerId !== customerId) {
        throw new ValidationError(`Cart belongs to ${cart.customerId}, not ${customerId}`);
      }
      if (cart.items.length === 0) {
        throw new EmptyCartError();
      }

      // 2. Re-check every line against the catalog as it is now
      const now = this.now();
      for (const item of cart.items) {
        if (item.kind === 'TICKET') assertVisitDate(item.visitDate, now);
      }
      const demand = demandOf(cart);
      for (const { ref, quantity } of demand) {
        const entry = await persisting('load catalog entry', () => loadCatalogEntry(this.store, ref));
        if (!entry) {
          throw new NotFoundError(kindLabel(ref.kind), ref.referenceId);
        }
        if (quantity > entry.stock) {
          throw new OutOfStockError(ref.referenceId, quantity, entry.stock);
        }
      }

      // 3. Total from the price snapshots taken when lines were added
      const pricing = calculatePricing(cart.items);
      const createdAt = now.toISOString();

      const order: Order = {
        orderId: this.newId(),
        customerId,
        items: pricing.items,
        total: pricing.total,
        status: 'CONFIRMED',
        createdAt,
      };

      const tickets: Ticket[] = pricing.items
        .filter(item => item.kind === 'TICKET')
        .map((item): Ticket => ({
          ticketId: this.newId(),
          orderId: order.orderId,
          customerId,
          parkId: item.referenceId,
          parkName: item.name,
          visitDate: item.visitDate ?? '',
          admits: item.quantity,
          unitPrice: item.unitPrice,
          status: 'ISSUED',
          createdAt,
          updatedAt: createdAt,
        }));

      // 4. Order, tickets, guarded stock decrements and the saved cart commit together or not at all
      const operations: WriteOperation[] = [
        { kind: 'insert', collection: 'orders', record: order },
        ...tickets.map((ticket): WriteOperation => ({ kind: 'insert', collection: 'tickets', record: ticket })),
      ];
      const firstStockOperation = operations.length;
      operations.push(...demand.map(({ ref, quantity }) => stockAdjustment(ref, -quantity)));
      operations.push({ kind: 'delete', collection: 'carts', key: customerId });

      try {
        await this.store.transact(operations);
      } catch (err) {
        const index = err instanceof ConditionFailedError ? err.operationIndex : undefined;
        const raced = index === undefined ? undefined : demand[index - firstStockOperation];
        if (raced) {
          const entry = await persisting('load catalog entry', () => loadCatalogEntry(this.store, raced.ref));
          throw new OutOfStockError(raced.ref.referenceId, raced.quantity, entry?.stock ?? 0);
        }
        throw new PersistenceError('Could not save the order', err);
      }

      await this.audit.record(customerId, 'ORDER', `Placed order ${order.orderId} for ${formatCents(order.total)}`);
      this.log({
        level: 'info',
        action: 'checkout.complete',
        customerId,
        orderId: order.orderId,
        total: order.total,
        tickets: tickets.length,
        durationMs: Date.now() - start,
      });

      return { order, tickets, cart: emptyCart(customerId) };
    } catch (err) {
      if (err instanceof BaseError && !(err instanceof PersistenceError)) {
        this.log({ level: 'warn', action: 'checkout.rejected', customerId, code: err.code, durationMs: Date.now() - start });
      } else {
        this.log({ level: 'error', action: 'checkout.error', customerId, error: describeError(err), durationMs: Date.now() - start });
      }
      throw err;
    }
  }
}
