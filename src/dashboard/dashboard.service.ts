import { Injectable } from '@nestjs/common';
import { withoutId } from '../common/stored-record';
import { OrdersRepository, StoredOrder } from '../orders/orders.repository';
import { ProductsRepository } from '../products/products.repository';

export const RECENT_ORDERS_LIMIT = 5;

export interface DashboardSummary {
  total_products: number;
  total_orders: number;
  total_revenue: number;
  recent_orders: Array<Omit<StoredOrder, 'id'>>;
}

/** Numeric value of a stored amount; missing counts as zero, junk as null. */
export function toAmount(value: unknown): number | null {
  if (value === undefined || value === null) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

@Injectable()
export class DashboardService {
  constructor(
    private readonly products: ProductsRepository,
    private readonly orders: OrdersRepository,
  ) {}

  async summary(): Promise<DashboardSummary> {
    const [totalProducts, totalOrders, amounts, recent] = await Promise.all([
      this.products.count(),
      this.orders.count(),
      this.orders.listAmountsUsd(),
      this.orders.findRecent(RECENT_ORDERS_LIMIT),
    ]);

    let revenue = 0;
    for (const value of amounts) {
      const amount = toAmount(value);
      if (amount !== null) revenue += amount;
    }

    return {
      total_products: totalProducts,
      total_orders: totalOrders,
      total_revenue: Number(revenue.toFixed(2)),
      recent_orders: recent.map(withoutId),
    };
  }
}
