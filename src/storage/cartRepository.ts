import { NotFoundError } from '../errors/httpError';
import { CartLine } from './sessionTypes';

// Per-session cart storage; lines are unique by product id and every method returns a copy.
export interface CartRepository {
  get(sessionId: string): Promise<CartLine[]>;
  // An existing line for the product keeps its first-seen name and price.
  add(sessionId: string, productId: number, name: string, price: number, quantity: number): Promise<CartLine[]>;
  update(sessionId: string, productId: number, quantity: number): Promise<CartLine[]>;
  remove(sessionId: string, productId: number): Promise<CartLine[]>;
  clear(sessionId: string): Promise<void>;
}

function copyLines(lines: CartLine[]): CartLine[] {
  return lines.map(line => ({ ...line }));
}

function missingLine(productId: number): NotFoundError {
  return new NotFoundError(`Product ${productId} not found in cart`);
}

// Each method completes its read-modify-write in one synchronous step.
export class InMemoryCartRepository implements CartRepository {
  private carts = new Map<string, CartLine[]>();

  // Returns the session's lines, or an empty cart for an unknown session.
  async get(sessionId: string): Promise<CartLine[]> {
    return copyLines(this.carts.get(sessionId) ?? []);
  }

  // Appends a new line or adds the quantity to the existing one.
  async add(sessionId: string, productId: number, name: string, price: number, quantity: number): Promise<CartLine[]> {
    const lines = this.carts.get(sessionId) ?? [];
    const existing = lines.find(line => line.productId === productId);
    if (existing) {
      existing.quantity += quantity;
    } else {
      lines.push({ productId, name, price, quantity });
    }
    this.carts.set(sessionId, lines);
    return copyLines(lines);
  }

  // Sets the quantity of an existing line; NotFoundError when absent.
  async update(sessionId: string, productId: number, quantity: number): Promise<CartLine[]> {
    const lines = this.carts.get(sessionId) ?? [];
    const existing = lines.find(line => line.productId === productId);
    if (!existing) throw missingLine(productId);
    existing.quantity = quantity;
    return copyLines(lines);
  }

  // Deletes a line; NotFoundError when absent.
  async remove(sessionId: string, productId: number): Promise<CartLine[]> {
    const lines = this.carts.get(sessionId) ?? [];
    const index = lines.findIndex(line => line.productId === productId);
    if (index === -1) throw missingLine(productId);
    lines.splice(index, 1);
    return copyLines(lines);
  }

  // Drops the session's cart entry; clearing twice is a no-op.
  async clear(sessionId: string): Promise<void> {
    this.carts.delete(sessionId);
  }
}
