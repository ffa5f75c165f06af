/**
 * Read-only view over the point-of-sale sales records, owned by the sales
 * module. Customers are matched by the name recorded on the sale, not by a
 * foreign key, so renaming a customer detaches its earlier sales.
 */

import type { Knex } from 'knex';
import { logger } from '../utils/logger.js';
import { parseMoney } from '../utils/format.js';

export const SALE_STATUS_COMPLETED = 'completed';

export interface SaleRecord {
  id: number;
  customerName: string;
  status: string;
  total: number;
  createdAt: Date;
}

export interface SalesSummary {
  count: number;
  total: number;
  lastPurchaseAt: Date | null;
}

export interface SalesSource {
  summarizeCompleted(customerName: string): Promise<SalesSummary>;
  recentCompleted(customerName: string, limit: number): Promise<SaleRecord[]>;
}

interface SaleRow {
  id: number | string;
  customer_name: string;
  status: string;
  total: string | number;
  created_at: Date | string;
}

interface SummaryRow {
  count: string | number;
  total: string | number | null;
  last_purchase_at: Date | string | null;
}

export interface KnexSalesSourceDeps {
  db: Knex;
  table: string;
}

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

export function createKnexSalesSource(deps: KnexSalesSourceDeps): SalesSource {
  const { db, table } = deps;

  async function summarizeCompleted(customerName: string): Promise<SalesSummary> {
    const row = await db(table)
      .where({ customer_name: customerName, status: SALE_STATUS_COMPLETED })
      .count('* as count')
      .sum('total as total')
      .max('created_at as last_purchase_at')
      .first<SummaryRow | undefined>();

    return {
      count: parseInt(String(row?.count ?? '0'), 10),
      total: parseMoney(row?.total),
      lastPurchaseAt: row?.last_purchase_at ? toDate(row.last_purchase_at) : null,
    };
  }

  async function recentCompleted(customerName: string, limit: number): Promise<SaleRecord[]> {
    const rows = await db(table)
      .where({ customer_name: customerName, status: SALE_STATUS_COMPLETED })
      .orderBy('created_at', 'desc')
      .limit(limit)
      .select<SaleRow[]>('id', 'customer_name', 'status', 'total', 'created_at');

    return rows.map((row) => ({
      id: Number(row.id),
      customerName: row.customer_name,
      status: row.status,
      total: parseMoney(row.total),
      createdAt: toDate(row.created_at),
    }));
  }

  return {
    summarizeCompleted,
    recentCompleted,
  };
}

/**
 * Returns a sales source when the feature is enabled and the sales table
 * exists, otherwise `null`. The customer module runs without the sales
 * module installed.
 */
export async function detectSalesSource(
  db: Knex,
  options: { enabled: boolean; table: string },
): Promise<SalesSource | null> {
  if (!options.enabled) {
    logger.info('Sales source disabled by configuration');
    return null;
  }

  const exists = await db.schema.hasTable(options.table);
  if (!exists) {
    logger.warn({ table: options.table }, 'Sales table not found; customer statistics disabled');
    return null;
  }

  logger.info({ table: options.table }, 'Sales source available');
  return createKnexSalesSource({ db, table: options.table });
}
