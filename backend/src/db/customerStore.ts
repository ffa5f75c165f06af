/**
 * Customer record store: the only code that reads or writes the
 * `customers` table.
 *
 * Rows come back from Postgres with decimals as strings and snake_case
 * columns; callers only ever see the mapped `Customer` shape.
 */

import type { Knex } from 'knex';
import { parseMoney } from '../utils/format.js';

export const CUSTOMERS_TABLE = 'customers';
export const MAX_LIST_ROWS = 100;

export interface Customer {
  id: number;
  name: string;
  email: string;
  phone: string;
  address: string;
  taxId: string;
  notes: string;
  totalSpent: number;
  visitCount: number;
  lastPurchaseAt: Date | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CustomerRow {
  id: number | string;
  name: string;
  email: string;
  phone: string;
  address: string;
  tax_id: string;
  notes: string;
  total_spent: string | number;
  visit_count: number;
  last_purchase_at: Date | string | null;
  is_active: boolean;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface NewCustomer {
  name: string;
  email: string;
  phone: string;
  address: string;
  taxId: string;
  notes: string;
}

export type CustomerChanges = Partial<Omit<Customer, 'id' | 'createdAt' | 'updatedAt'>>;

export type CustomerStatusFilter = 'active' | 'inactive' | 'all';

export interface CustomerListFilter {
  status: CustomerStatusFilter;
  search?: string;
  limit?: number;
}

export interface CustomerCounts {
  active: number;
  inactive: number;
}

export interface CustomerStore {
  insert(input: NewCustomer): Promise<Customer>;
  findById(id: number): Promise<Customer | undefined>;
  update(id: number, changes: CustomerChanges): Promise<Customer | undefined>;
  list(filter: CustomerListFilter): Promise<Customer[]>;
  countByStatus(): Promise<CustomerCounts>;
  listActiveByName(): Promise<Customer[]>;
}

export interface KnexCustomerStoreDeps {
  db: Knex;
}

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

export function rowToCustomer(row: CustomerRow): Customer {
  return {
    id: Number(row.id),
    name: row.name,
    email: row.email,
    phone: row.phone,
    address: row.address,
    taxId: row.tax_id,
    notes: row.notes,
    totalSpent: parseMoney(row.total_spent),
    visitCount: Number(row.visit_count),
    lastPurchaseAt: row.last_purchase_at === null ? null : toDate(row.last_purchase_at),
    isActive: Boolean(row.is_active),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function changesToColumns(changes: CustomerChanges): Record<string, unknown> {
  const columns: Record<string, unknown> = {};
  if (changes.name !== undefined) columns.name = changes.name;
  if (changes.email !== undefined) columns.email = changes.email;
  if (changes.phone !== undefined) columns.phone = changes.phone;
  if (changes.address !== undefined) columns.address = changes.address;
  if (changes.taxId !== undefined) columns.tax_id = changes.taxId;
  if (changes.notes !== undefined) columns.notes = changes.notes;
  if (changes.totalSpent !== undefined) columns.total_spent = changes.totalSpent.toFixed(2);
  if (changes.visitCount !== undefined) columns.visit_count = changes.visitCount;
  if (changes.lastPurchaseAt !== undefined) columns.last_purchase_at = changes.lastPurchaseAt;
  if (changes.isActive !== undefined) columns.is_active = changes.isActive;
  return columns;
}

/** Escapes LIKE wildcards so the term matches as a literal substring. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function createKnexCustomerStore(deps: KnexCustomerStoreDeps): CustomerStore {
  const { db } = deps;

  async function insert(input: NewCustomer): Promise<Customer> {
    const [row] = await db(CUSTOMERS_TABLE)
      .insert({
        name: input.name,
        email: input.email,
        phone: input.phone,
        address: input.address,
        tax_id: input.taxId,
        notes: input.notes,
      })
      .returning('*');

    return rowToCustomer(row);
  }

  async function findById(id: number): Promise<Customer | undefined> {
    const row = await db(CUSTOMERS_TABLE)
      .where({ id })
      .first<CustomerRow | undefined>();

    return row ? rowToCustomer(row) : undefined;
  }

  async function update(id: number, changes: CustomerChanges): Promise<Customer | undefined> {
    const [row] = await db(CUSTOMERS_TABLE)
      .where({ id })
      .update({ ...changesToColumns(changes), updated_at: db.fn.now() })
      .returning('*');

    return row ? rowToCustomer(row) : undefined;
  }

  async function list(filter: CustomerListFilter): Promise<Customer[]> {
    const query = db(CUSTOMERS_TABLE);

    if (filter.status === 'active') {
      query.where({ is_active: true });
    } else if (filter.status === 'inactive') {
      query.where({ is_active: false });
    }

    const search = filter.search?.trim() ?? '';
    if (search !== '') {
      const pattern = `%${escapeLikePattern(search)}%`;
      query.where((builder) => {
        builder
          .whereILike('name', pattern)
          .orWhereILike('phone', pattern)
          .orWhereILike('email', pattern)
          .orWhereILike('tax_id', pattern);
      });
    }

    const rows = await query
      .orderBy([
        { column: 'created_at', order: 'desc' },
        { column: 'id', order: 'desc' },
      ])
      .limit(filter.limit ?? MAX_LIST_ROWS)
      .select<CustomerRow[]>('*');

    return rows.map(rowToCustomer);
  }

  async function countByStatus(): Promise<CustomerCounts> {
    const [activeResult, inactiveResult] = await Promise.all([
      db(CUSTOMERS_TABLE).where({ is_active: true }).count('* as count').first<{ count: string }>(),
      db(CUSTOMERS_TABLE).where({ is_active: false }).count('* as count').first<{ count: string }>(),
    ]);

    return {
      active: parseInt(activeResult?.count ?? '0', 10),
      inactive: parseInt(inactiveResult?.count ?? '0', 10),
    };
  }

  async function listActiveByName(): Promise<Customer[]> {
    const rows = await db(CUSTOMERS_TABLE)
      .where({ is_active: true })
      .orderBy([
        { column: 'name', order: 'asc' },
        { column: 'id', order: 'asc' },
      ])
      .select<CustomerRow[]>('*');

    return rows.map(rowToCustomer);
  }

  return {
    insert,
    findById,
    update,
    list,
    countByStatus,
    listActiveByName,
  };
}
