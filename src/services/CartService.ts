import { QuantityLimitError } from '../errors/httpError';
import { logger } from '../logger';
import { MAX_QUANTITY } from '../shop/shopSchemas';
import { CartView, toCartView } from '../shop/shopMapper';
import { ShopStore } from '../storage/shopStore';

const log = logger.child({ module: 'cart' });

// Cart operations for one session; mutations share the session lock with checkout.
export class CartService {
  private store: ShopStore;

  constructor(store: ShopStore) {
    this.store = store;
  }

  async getCart(sessionId: string): Promise<CartView> {
    return toCartView(await this.store.carts.get(sessionId));
  }

  async addItem(sessionId: string, productId: number, name: string, price: number, quantity: number): Promise<CartView> {
    const lines = await this.store.sessionLocks.run(sessionId, async () => {
      const current = await this.store.carts.get(sessionId);
      const held = current.find(line => line.productId === productId)?.quantity ?? 0;
      if (held + quantity > MAX_QUANTITY) throw new QuantityLimitError(MAX_QUANTITY);
      return this.store.carts.add(sessionId, productId, name, price, quantity);
    });
    log.debug({ sessionId, productId, quantity }, 'Item added to cart');
    return toCartView(lines);
  }

  async updateItem(sessionId: string, productId: number, quantity: number): Promise<CartView> {
    const lines = await this.store.sessionLocks.run(sessionId, () =>
      this.store.carts.update(sessionId, productId, quantity),
    );
    log.debug({ sessionId, productId, quantity }, 'Cart item quantity set');
    return toCartView(lines);
  }

  async removeItem(sessionId: string, productId: number): Promise<CartView> {
    const lines = await this.store.sessionLocks.run(sessionId, () => this.store.carts.remove(sessionId, productId));
    log.debug({ sessionId, productId }, 'Item removed from cart');
    return toCartView(lines);
  }

  async clearCart(sessionId: string): Promise<void> {
    await this.store.sessionLocks.run(sessionId, () => this.store.carts.clear(sessionId));
    log.debug({ sessionId }, 'Cart cleared');
  }
}
