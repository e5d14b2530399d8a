import { emptyCart } from './cart';
import { persisting } from './errors';
import type { DocumentStore } from './repository';
import type { Cart } from './types';

/**
 * Keeps a customer's cart between runs. One record per customer; an empty
 * cart has no record.
 */
export class CartStore {
  constructor(
    private readonly store: DocumentStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** The saved cart, or an empty one if none exists. */
  async load(customerId: string): Promise<Cart> {
    const saved = await persisting('load cart', () => this.store.get('carts', customerId));
    return saved ? { customerId, items: saved.items } : emptyCart(customerId);
  }

  async save(cart: Cart): Promise<void> {
    if (cart.items.length === 0) {
      await this.discard(cart.customerId);
      return;
    }
    await persisting('save cart', () =>
      this.store.replaceOne('carts', {
        customerId: cart.customerId,
        items: cart.items,
        updatedAt: this.now().toISOString(),
      })
    );
  }

  async discard(customerId: string): Promise<void> {
    await persisting('discard cart', () => this.store.deleteOne('carts', customerId));
  }
}
