import type { Customer, CustomerStore } from '../db/customerStore.js';
import type { SaleRecord, SalesSource } from '../db/salesSource.js';
import { AppError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';
import { customerNotFound } from './customerService.js';

export const DEFAULT_RECENT_PURCHASES_LIMIT = 10;

export interface CustomerStatsServiceDeps {
  store: CustomerStore;
  /** `null` when the sales module is not installed. */
  salesSource: SalesSource | null;
}

export function createCustomerStatsService(deps: CustomerStatsServiceDeps) {
  const { store, salesSource } = deps;

  /**
   * Recomputes visit count, total spent and last purchase from the customer's
   * completed sales. Without a sales source the customer is returned as is.
   */
  async function updateStats(customer: Customer): Promise<Customer> {
    if (!salesSource) {
      logger.debug({ customerId: customer.id }, 'Sales source unavailable; stats left unchanged');
      return customer;
    }

    const summary = await salesSource.summarizeCompleted(customer.name);
    const changes = {
      visitCount: summary.count,
      totalSpent: summary.total,
      lastPurchaseAt: summary.lastPurchaseAt ?? customer.lastPurchaseAt,
    };

    const updated = await store.update(customer.id, changes);

    logger.info(
      { customerId: customer.id, visitCount: summary.count, totalSpent: summary.total },
      'Customer stats updated',
    );
    return updated ?? { ...customer, ...changes };
  }

  async function getRecentPurchases(
    customer: Customer,
    limit: number = DEFAULT_RECENT_PURCHASES_LIMIT,
  ): Promise<SaleRecord[]> {
    if (!salesSource) {
      return [];
    }
    return salesSource.recentCompleted(customer.name, limit);
  }

  async function refreshStats(customerId: number): Promise<Result<Customer>> {
    try {
      const customer = await store.findById(customerId);
      if (!customer) {
        return fail(customerNotFound());
      }
      return ok(await updateStats(customer));
    } catch (err) {
      logger.error({ customerId, err }, 'Failed to update customer stats');
      return fail(
        new AppError('Failed to update customer stats', { code: 'STATS_FAILED', cause: toError(err) }),
      );
    }
  }

  return {
    updateStats,
    getRecentPurchases,
    refreshStats,
    hasSalesSource: salesSource !== null,
  };
}

export type CustomerStatsService = ReturnType<typeof createCustomerStatsService>;
