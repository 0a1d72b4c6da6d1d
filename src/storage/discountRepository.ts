import { DiscountLedger, DiscountRecord, Order } from './sessionTypes';

// Per-session discount bookkeeping: one available code at most, plus used history.
export interface DiscountRepository {
  // Installs a code unless one is already available; returns whichever code is available afterwards.
  issue(sessionId: string, code: string, percent: number): Promise<string>;
  // Returns the available record only when its code matches exactly.
  lookup(sessionId: string, code: string): Promise<DiscountRecord | undefined>;
  // Moves the available record (if any) into used history, attributed to `order`.
  consume(sessionId: string, order: Order): Promise<void>;
  wasUsed(sessionId: string, code: string): Promise<boolean>;
  // Snapshot of every session's ledger, keyed by session id.
  list(): Promise<Map<string, DiscountLedger>>;
}

function copyLedger(ledger: DiscountLedger): DiscountLedger {
  return {
    available: ledger.available ? { ...ledger.available } : undefined,
    used: ledger.used.map(entry => ({ ...entry })),
  };
}

export class InMemoryDiscountRepository implements DiscountRepository {
  private ledgers = new Map<string, DiscountLedger>();

  // Returns the live ledger, creating an empty one on first touch.
  private ledgerFor(sessionId: string): DiscountLedger {
    let ledger = this.ledgers.get(sessionId);
    if (!ledger) {
      ledger = { used: [] };
      this.ledgers.set(sessionId, ledger);
    }
    return ledger;
  }

  // Installs the code only when the session has no available code.
  async issue(sessionId: string, code: string, percent: number): Promise<string> {
    const ledger = this.ledgerFor(sessionId);
    if (!ledger.available) {
      ledger.available = { code, percent, issuedAt: new Date().toISOString() };
    }
    return ledger.available.code;
  }

  // Exact, case-sensitive match against the available slot.
  async lookup(sessionId: string, code: string): Promise<DiscountRecord | undefined> {
    const available = this.ledgers.get(sessionId)?.available;
    if (!available || available.code !== code) return undefined;
    return { ...available };
  }

  // Records the available code as used by the order and empties the slot.
  async consume(sessionId: string, order: Order): Promise<void> {
    const ledger = this.ledgerFor(sessionId);
    const available = ledger.available;
    if (!available) return;

    ledger.used.push({
      orderId: order.id,
      code: available.code,
      percent: available.percent,
      amount: order.discountAmount,
      usedAt: order.createdAt,
    });
    ledger.available = undefined;
  }

  // Checks the used history for the exact code.
  async wasUsed(sessionId: string, code: string): Promise<boolean> {
    return this.ledgers.get(sessionId)?.used.some(entry => entry.code === code) ?? false;
  }

  // Copies every ledger for reporting.
  async list(): Promise<Map<string, DiscountLedger>> {
    const snapshot = new Map<string, DiscountLedger>();
    for (const [sessionId, ledger] of this.ledgers) {
      snapshot.set(sessionId, copyLedger(ledger));
    }
    return snapshot;
  }
}
