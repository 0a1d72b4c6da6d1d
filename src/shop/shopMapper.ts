import { CartLine, SessionRecord } from '../storage/sessionTypes';
import { lineTotal, roundMoney } from './money';

// REST response shapes (snake_case on the wire).
export interface CartItemView {
  product_id: number;
  name: string;
  price: number;
  quantity: number;
}

export interface CartView {
  items: CartItemView[];
  total_items: number;
  subtotal: number;
}

export interface CheckoutResultView {
  order_id: string;
  subtotal: number;
  discount_applied: boolean;
  discount_amount: number;
  total_amount: number;
  new_discount_code: string | null;
  message: string;
  timestamp: string;
}

export interface StatisticsView {
  total_orders: number;
  total_items_purchased: number;
  total_purchase_amount: number;
  total_discount_amount: number;
  discount_codes: string[];
  average_order_value: number;
  discount_utilization_rate: number;
}

export interface UserView {
  session_id: string;
  created_at: string;
}

export function toCartItemView(line: CartLine): CartItemView {
  return {
    product_id: line.productId,
    name: line.name,
    price: roundMoney(line.price),
    quantity: line.quantity,
  };
}

// Maps cart lines to the cart response, computing item count and subtotal.
export function toCartView(lines: CartLine[]): CartView {
  return {
    items: lines.map(toCartItemView),
    total_items: lines.reduce((sum, line) => sum + line.quantity, 0),
    subtotal: roundMoney(lines.reduce((sum, line) => sum + lineTotal(line), 0)),
  };
}

export function toUserView(rec: SessionRecord): UserView {
  return { session_id: rec.id, created_at: rec.createdAt };
}
