import { nanoid } from 'nanoid';
import { Order, OrderDraft, OrderHistory } from './sessionTypes';

// Append-only order history per session.
export interface OrderRepository {
  // Returns undefined (and records nothing) when the draft has no lines.
  createOrder(sessionId: string, draft: OrderDraft): Promise<Order | undefined>;
  getHistory(sessionId: string): Promise<OrderHistory | undefined>;
  list(): Promise<Map<string, OrderHistory>>;
}

function copyOrder(order: Order): Order {
  return { ...order, lines: order.lines.map(line => ({ ...line })) };
}

function copyHistory(history: OrderHistory): OrderHistory {
  return { orderCount: history.orderCount, orders: history.orders.map(copyOrder) };
}

export class InMemoryOrderRepository implements OrderRepository {
  private histories = new Map<string, OrderHistory>();

  // Stamps id and timestamp, appends the order and bumps the session's count.
  async createOrder(sessionId: string, draft: OrderDraft): Promise<Order | undefined> {
    if (draft.lines.length === 0) return undefined;

    const order: Order = Object.freeze({
      ...draft,
      lines: draft.lines.map(line => Object.freeze({ ...line })),
      id: nanoid(),
      sessionId,
      createdAt: new Date().toISOString(),
    });

    const history = this.histories.get(sessionId) ?? { orderCount: 0, orders: [] };
    history.orders.push(order);
    history.orderCount += 1;
    this.histories.set(sessionId, history);
    return copyOrder(order);
  }

  // Returns the session's history, or undefined before its first order.
  async getHistory(sessionId: string): Promise<OrderHistory | undefined> {
    const history = this.histories.get(sessionId);
    return history ? copyHistory(history) : undefined;
  }

  // Copies every history for reporting.
  async list(): Promise<Map<string, OrderHistory>> {
    const snapshot = new Map<string, OrderHistory>();
    for (const [sessionId, history] of this.histories) {
      snapshot.set(sessionId, copyHistory(history));
    }
    return snapshot;
  }
}
