import { DELIVERED_STATUS } from "../config";
import {
  CustomerOrderProfile,
  RfmOrderInput,
  RfmOrderItemInput
} from "./types";

type ProfileAccumulator = {
  lastPurchaseMs: number | null;
  orderIds: Set<string>;
  totalMonetary: number;
};

/**
 * Collapses delivered orders and their line items into one profile per
 * customer. Items are left-joined, so a delivered order without item rows
 * still counts toward `orderCount` and adds nothing to `totalMonetary`.
 */
export function aggregateCustomerOrders(
  orders: readonly RfmOrderInput[],
  items: readonly RfmOrderItemInput[]
): CustomerOrderProfile[] {
  const itemTotalsByOrder = new Map<string, number>();
  for (const item of items) {
    const current = itemTotalsByOrder.get(item.orderId) ?? 0;
    itemTotalsByOrder.set(item.orderId, current + item.price + item.freightValue);
  }

  const byCustomer = new Map<string, ProfileAccumulator>();
  const countedOrders = new Set<string>();

  for (const order of orders) {
    if (order.orderStatus !== DELIVERED_STATUS) {
      continue;
    }

    const acc = byCustomer.get(order.customerId) ?? {
      lastPurchaseMs: null,
      orderIds: new Set<string>(),
      totalMonetary: 0
    };

    const purchasedMs = order.orderPurchaseTimestamp?.getTime();
    if (purchasedMs !== undefined && !Number.isNaN(purchasedMs)) {
      acc.lastPurchaseMs =
        acc.lastPurchaseMs === null
          ? purchasedMs
          : Math.max(acc.lastPurchaseMs, purchasedMs);
    }

    acc.orderIds.add(order.orderId);

    // The same order row listed twice must not double its items.
    const orderKey = `${order.customerId}\u0000${order.orderId}`;
    if (!countedOrders.has(orderKey)) {
      countedOrders.add(orderKey);
      acc.totalMonetary += itemTotalsByOrder.get(order.orderId) ?? 0;
    }

    byCustomer.set(order.customerId, acc);
  }

  return [...byCustomer.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([customerId, acc]) => ({
      customerId,
      lastPurchaseDate:
        acc.lastPurchaseMs === null ? null : new Date(acc.lastPurchaseMs),
      orderCount: acc.orderIds.size,
      totalMonetary: acc.totalMonetary
    }));
}
