import { CartRepository, InMemoryCartRepository } from './cartRepository';
import { DiscountRepository, InMemoryDiscountRepository } from './discountRepository';
import { KeyedLock } from './keyedLock';
import { InMemoryOrderRepository, OrderRepository } from './orderRepository';
import { InMemorySessionRepository, SessionRepository } from './sessionRepository';

// Every piece of process-local state, created once at startup and handed to the services.
export interface ShopStore {
  sessions: SessionRepository;
  carts: CartRepository;
  discounts: DiscountRepository;
  orders: OrderRepository;
  // Per-session exclusive region shared by cart mutations and checkout.
  sessionLocks: KeyedLock;
}

export function createShopStore(overrides: Partial<ShopStore> = {}): ShopStore {
  return {
    sessions: overrides.sessions ?? new InMemorySessionRepository(),
    carts: overrides.carts ?? new InMemoryCartRepository(),
    discounts: overrides.discounts ?? new InMemoryDiscountRepository(),
    orders: overrides.orders ?? new InMemoryOrderRepository(),
    sessionLocks: overrides.sessionLocks ?? new KeyedLock(),
  };
}
