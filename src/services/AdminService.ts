import { logger } from '../logger';
import { roundMoney } from '../shop/money';
import { StatisticsView, UserView, toUserView } from '../shop/shopMapper';
import { ShopStore } from '../storage/shopStore';

const log = logger.child({ module: 'admin' });

// Read-only reporting over order histories and discount ledgers.
export class AdminService {
  private store: ShopStore;

  constructor(store: ShopStore) {
    this.store = store;
  }

  /**
   * Aggregates store-wide figures. `total_items_purchased` counts orders, not units,
   * and the utilization rate is used codes over every code ever issued.
   */
  async getStatistics(): Promise<StatisticsView> {
    const histories = await this.store.orders.list();
    const ledgers = await this.store.discounts.list();

    let totalOrders = 0;
    let totalItemsPurchased = 0;
    let totalPurchaseAmount = 0;
    let totalDiscountAmount = 0;
    for (const history of histories.values()) {
      totalOrders += history.orderCount;
      totalItemsPurchased += history.orders.length;
      for (const order of history.orders) {
        totalPurchaseAmount += order.total;
        totalDiscountAmount += order.discountAmount;
      }
    }

    const discountCodes: string[] = [];
    let usedCount = 0;
    let availableCount = 0;
    for (const ledger of ledgers.values()) {
      if (ledger.available) {
        availableCount += 1;
        discountCodes.push(ledger.available.code);
      }
      usedCount += ledger.used.length;
      discountCodes.push(...ledger.used.map(entry => entry.code));
    }

    const issuedCount = usedCount + availableCount;
    const stats: StatisticsView = {
      total_orders: totalOrders,
      total_items_purchased: totalItemsPurchased,
      total_purchase_amount: roundMoney(totalPurchaseAmount),
      total_discount_amount: roundMoney(totalDiscountAmount),
      discount_codes: discountCodes,
      average_order_value: totalOrders > 0 ? roundMoney(totalPurchaseAmount / totalOrders) : 0,
      discount_utilization_rate: issuedCount > 0 ? roundMoney((usedCount / issuedCount) * 100) : 0,
    };

    log.info({ totalOrders, totalPurchaseAmount: stats.total_purchase_amount }, 'Statistics retrieved');
    return stats;
  }

  async getUsers(): Promise<UserView[]> {
    const sessions = await this.store.sessions.list();
    return sessions.map(toUserView);
  }
}
