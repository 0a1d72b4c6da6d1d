// Anonymous visitor identity; created on first contact and never mutated.
export interface SessionRecord {
  id: string;
  createdAt: string;
}

export interface CartLine {
  productId: number;
  name: string;
  // Unit price, already rounded to 2 decimals by the request schema.
  price: number;
  quantity: number;
}

// Figures for an order before the store assigns its id and timestamp.
export interface OrderDraft {
  lines: CartLine[];
  subtotal: number;
  discountCode?: string;
  discountAmount: number;
  discountPercent?: number;
  total: number;
}

export interface Order extends OrderDraft {
  id: string;
  sessionId: string;
  createdAt: string;
}

export interface OrderHistory {
  // Counter of record for nth-order discount eligibility.
  orderCount: number;
  orders: Order[];
}

export interface DiscountRecord {
  code: string;
  percent: number;
  issuedAt: string;
}

export interface UsedDiscount {
  orderId: string;
  code: string;
  percent: number;
  amount: number;
  usedAt: string;
}

// Per-session discount bookkeeping: at most one available code plus the used history.
export interface DiscountLedger {
  available?: DiscountRecord;
  used: UsedDiscount[];
}
