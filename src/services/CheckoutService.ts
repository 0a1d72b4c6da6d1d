import { DiscountSettings } from '../config';
import {
  DiscountAlreadyUsedError,
  EmptyCartError,
  HttpError,
  InternalFailureError,
  InvalidDiscountCodeError,
} from '../errors/httpError';
import { logger } from '../logger';
import { lineTotal, roundMoney } from '../shop/money';
import { CheckoutResultView } from '../shop/shopMapper';
import { ShopStore } from '../storage/shopStore';
import { CartLine, DiscountRecord, Order } from '../storage/sessionTypes';
import { DiscountService } from './DiscountService';

const log = logger.child({ module: 'checkout' });

/**
 * Turns a session's cart into an order.
 *
 * The workflow runs as ReadCart → ValidateDiscount → ComputeTotals → PersistOrder →
 * ConsumeDiscount → EvaluateEligibility → ClearCart → BuildResult, inside the session's
 * exclusive region, so a concurrent checkout or cart mutation for the same session
 * waits until this one has cleared the cart or been rejected.
 *
 * Rejections (empty cart, unknown code, used code) are raised before any write.
 */
export class CheckoutService {
  private store: ShopStore;
  private settings: DiscountSettings;
  private discounts: DiscountService;

  constructor(store: ShopStore, settings: DiscountSettings, discounts: DiscountService) {
    this.store = store;
    this.settings = settings;
    this.discounts = discounts;
  }

  /**
   * @param discountCode - optional code; an empty string is treated as no code
   * @throws EmptyCartError, InvalidDiscountCodeError, DiscountAlreadyUsedError, InternalFailureError
   */
  async checkout(sessionId: string, discountCode?: string | null): Promise<CheckoutResultView> {
    const code = discountCode ? discountCode : undefined;
    return this.store.sessionLocks.run(sessionId, async () => {
      try {
        return await this.runWorkflow(sessionId, code);
      } catch (err) {
        if (err instanceof HttpError) throw err;
        log.error({ sessionId, err }, 'Checkout failed');
        throw new InternalFailureError('An error occurred during checkout', err);
      }
    });
  }

  private async runWorkflow(sessionId: string, code: string | undefined): Promise<CheckoutResultView> {
    const lines = await this.store.carts.get(sessionId);
    if (lines.length === 0) throw new EmptyCartError();

    log.info({ sessionId, items: lines.length, discountCode: code ?? null }, 'Processing checkout');

    const discount = code ? await this.validateDiscount(sessionId, code) : undefined;

    const subtotal = this.calculateSubtotal(lines);
    const discountAmount = discount ? subtotal * (discount.percent / 100) : 0;
    const total = subtotal - discountAmount;

    const order = await this.store.orders.createOrder(sessionId, {
      lines,
      subtotal,
      discountCode: discount?.code,
      discountAmount,
      discountPercent: discount?.percent,
      total,
    });
    if (!order) {
      throw new Error('Order store refused a non-empty cart');
    }

    if (discount) {
      await this.store.discounts.consume(sessionId, order);
    }

    const newDiscountCode = await this.evaluateEligibility(sessionId);

    await this.store.carts.clear(sessionId);

    log.info(
      { sessionId, orderId: order.id, total: roundMoney(total), newDiscountCode: newDiscountCode ?? null },
      'Order created',
    );

    return this.buildResult(order, newDiscountCode);
  }

  private calculateSubtotal(lines: CartLine[]): number {
    return lines.reduce((sum, line) => sum + lineTotal(line), 0);
  }

  // A used code is reported as such even though it can no longer match the available slot.
  private async validateDiscount(sessionId: string, code: string): Promise<DiscountRecord> {
    if (await this.store.discounts.wasUsed(sessionId, code)) {
      throw new DiscountAlreadyUsedError();
    }
    const record = await this.store.discounts.lookup(sessionId, code);
    if (!record || record.code !== code) {
      throw new InvalidDiscountCodeError();
    }
    return record;
  }

  // Issues a code when the post-increment order count is a positive multiple of nthOrder.
  private async evaluateEligibility(sessionId: string): Promise<string | undefined> {
    const history = await this.store.orders.getHistory(sessionId);
    const count = history?.orderCount ?? 0;
    if (count === 0 || count % this.settings.nthOrder !== 0) return undefined;

    // issue() hands back a code that is already available rather than minting a second one.
    const code = await this.discounts.issueCode(sessionId);
    log.info({ sessionId, orderCount: count, code }, 'Nth-order discount code issued');
    return code;
  }

  private buildResult(order: Order, newDiscountCode: string | undefined): CheckoutResultView {
    let message = 'Order placed successfully!';
    if (newDiscountCode) {
      message += ` You've earned a discount code: ${newDiscountCode}`;
    }

    return {
      order_id: order.id,
      subtotal: roundMoney(order.subtotal),
      discount_applied: order.discountCode !== undefined,
      discount_amount: roundMoney(order.discountAmount),
      total_amount: roundMoney(order.total),
      new_discount_code: newDiscountCode ?? null,
      message,
      timestamp: order.createdAt,
    };
  }
}
