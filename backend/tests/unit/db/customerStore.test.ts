import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type { Knex } from 'knex';
import {
  createKnexCustomerStore,
  escapeLikePattern,
  rowToCustomer,
  type CustomerRow,
} from '../../../src/db/customerStore.js';

// ── Helpers ─────────────────────────────────────────────────────────

interface MockQueryBuilder {
  where: jest.Mock<(arg: unknown) => MockQueryBuilder>;
  whereILike: jest.Mock<(column: string, pattern: string) => MockQueryBuilder>;
  orWhereILike: jest.Mock<(column: string, pattern: string) => MockQueryBuilder>;
  orderBy: jest.Mock<(arg: unknown) => MockQueryBuilder>;
  limit: jest.Mock<(count: number) => MockQueryBuilder>;
  insert: jest.Mock<(values: unknown) => MockQueryBuilder>;
  update: jest.Mock<(values: unknown) => MockQueryBuilder>;
  count: jest.Mock<(column: string) => MockQueryBuilder>;
  returning: jest.Mock<(column: string) => Promise<unknown[]>>;
  first: jest.Mock<() => Promise<unknown>>;
  select: jest.Mock<(...columns: string[]) => Promise<unknown[]>>;
}

function createBuilder(): MockQueryBuilder {
  const builder: MockQueryBuilder = {
    where: jest.fn<(arg: unknown) => MockQueryBuilder>(() => builder),
    whereILike: jest.fn<(column: string, pattern: string) => MockQueryBuilder>(() => builder),
    orWhereILike: jest.fn<(column: string, pattern: string) => MockQueryBuilder>(() => builder),
    orderBy: jest.fn<(arg: unknown) => MockQueryBuilder>(() => builder),
    limit: jest.fn<(count: number) => MockQueryBuilder>(() => builder),
    insert: jest.fn<(values: unknown) => MockQueryBuilder>(() => builder),
    update: jest.fn<(values: unknown) => MockQueryBuilder>(() => builder),
    count: jest.fn<(column: string) => MockQueryBuilder>(() => builder),
    returning: jest.fn<(column: string) => Promise<unknown[]>>().mockResolvedValue([]),
    first: jest.fn<() => Promise<unknown>>().mockResolvedValue(undefined),
    select: jest.fn<(...columns: string[]) => Promise<unknown[]>>().mockResolvedValue([]),
  };
  return builder;
}

function createMockDb() {
  const builder = createBuilder();
  const db = Object.assign(
    jest.fn<(table: string) => MockQueryBuilder>(() => builder),
    { fn: { now: jest.fn(() => 'NOW()') } },
  );
  return { db, builder };
}

function makeRow(overrides: Partial<CustomerRow> = {}): CustomerRow {
  return {
    id: '7',
    name: 'John Doe',
    email: 'john@example.com',
    phone: '+34600123456',
    address: '',
    tax_id: '',
    notes: '',
    total_spent: '0.00',
    visit_count: 0,
    last_purchase_at: null,
    is_active: true,
    created_at: new Date('2026-03-01T09:00:00.000Z'),
    updated_at: new Date('2026-03-01T09:00:00.000Z'),
    ...overrides,
  };
}

// ── Tests ───────────────────────────────────────────────────────────

describe('knex customer store', () => {
  let db: ReturnType<typeof createMockDb>['db'];
  let builder: MockQueryBuilder;
  let store: ReturnType<typeof createKnexCustomerStore>;

  beforeEach(() => {
    jest.clearAllMocks();
    const mocks = createMockDb();
    db = mocks.db;
    builder = mocks.builder;
    store = createKnexCustomerStore({ db: db as unknown as Knex });
  });

  describe('insert()', () => {
    it('writes the snake_case columns and maps the returned row', async () => {
      builder.returning.mockResolvedValueOnce([makeRow()]);

      const customer = await store.insert({
        name: 'John Doe',
        email: 'john@example.com',
        phone: '+34600123456',
        address: '',
        taxId: '',
        notes: '',
      });

      expect(db).toHaveBeenCalledWith('customers');
      expect(builder.insert).toHaveBeenCalledWith({
        name: 'John Doe',
        email: 'john@example.com',
        phone: '+34600123456',
        address: '',
        tax_id: '',
        notes: '',
      });
      expect(builder.returning).toHaveBeenCalledWith('*');
      expect(customer.id).toBe(7);
      expect(customer.totalSpent).toBe(0);
      expect(customer.isActive).toBe(true);
      expect(customer.lastPurchaseAt).toBeNull();
    });
  });

  describe('findById()', () => {
    it('looks the row up by id', async () => {
      builder.first.mockResolvedValueOnce(makeRow({ id: 5 }));

      const customer = await store.findById(5);

      expect(builder.where).toHaveBeenCalledWith({ id: 5 });
      expect(customer?.id).toBe(5);
    });

    it('returns undefined when no row matches', async () => {
      builder.first.mockResolvedValueOnce(undefined);

      expect(await store.findById(99)).toBeUndefined();
    });
  });

  describe('update()', () => {
    it('writes only the given fields and refreshes updated_at', async () => {
      builder.returning.mockResolvedValueOnce([makeRow({ is_active: false })]);

      const customer = await store.update(7, { isActive: false });

      expect(builder.where).toHaveBeenCalledWith({ id: 7 });
      expect(builder.update).toHaveBeenCalledWith({ is_active: false, updated_at: 'NOW()' });
      expect(customer?.isActive).toBe(false);
    });

    it('stores money with two decimals', async () => {
      const lastPurchaseAt = new Date('2026-02-10T12:15:00.000Z');
      builder.returning.mockResolvedValueOnce([makeRow({ total_spent: '12.50', visit_count: 2 })]);

      const customer = await store.update(7, { totalSpent: 12.5, visitCount: 2, lastPurchaseAt });

      expect(builder.update).toHaveBeenCalledWith({
        total_spent: '12.50',
        visit_count: 2,
        last_purchase_at: lastPurchaseAt,
        updated_at: 'NOW()',
      });
      expect(customer?.totalSpent).toBe(12.5);
    });

    it('maps every editable field to its column', async () => {
      builder.returning.mockResolvedValueOnce([makeRow()]);

      await store.update(7, {
        name: 'N',
        email: 'e@example.com',
        phone: '1',
        address: 'A',
        taxId: 'T',
        notes: 'x',
        isActive: true,
      });

      expect(builder.update).toHaveBeenCalledWith({
        name: 'N',
        email: 'e@example.com',
        phone: '1',
        address: 'A',
        tax_id: 'T',
        notes: 'x',
        is_active: true,
        updated_at: 'NOW()',
      });
    });

    it('returns undefined when no row was updated', async () => {
      builder.returning.mockResolvedValueOnce([]);

      expect(await store.update(404, { isActive: false })).toBeUndefined();
    });
  });

  describe('list()', () => {
    it('filters active customers, newest first, capped at 100', async () => {
      builder.select.mockResolvedValueOnce([makeRow({ id: 2 }), makeRow({ id: 1 })]);

      const customers = await store.list({ status: 'active' });

      expect(builder.where).toHaveBeenCalledWith({ is_active: true });
      expect(builder.orderBy).toHaveBeenCalledWith([
        { column: 'created_at', order: 'desc' },
        { column: 'id', order: 'desc' },
      ]);
      expect(builder.limit).toHaveBeenCalledWith(100);
      expect(builder.select).toHaveBeenCalledWith('*');
      expect(customers.map((c) => c.id)).toEqual([2, 1]);
    });

    it('filters inactive customers', async () => {
      await store.list({ status: 'inactive' });

      expect(builder.where).toHaveBeenCalledWith({ is_active: false });
    });

    it('applies no filter for all without a search', async () => {
      await store.list({ status: 'all', search: '   ' });

      expect(builder.where).not.toHaveBeenCalled();
    });

    it('searches four columns case-insensitively with an escaped pattern', async () => {
      await store.list({ status: 'all', search: ' 50%_off ' });

      expect(builder.where).toHaveBeenCalledTimes(1);
      const grouped = builder.where.mock.calls[0][0];
      expect(typeof grouped).toBe('function');
      if (typeof grouped !== 'function') return;

      const inner = createBuilder();
      grouped(inner);

      expect(inner.whereILike).toHaveBeenCalledWith('name', '%50\\%\\_off%');
      expect(inner.orWhereILike.mock.calls).toEqual([
        ['phone', '%50\\%\\_off%'],
        ['email', '%50\\%\\_off%'],
        ['tax_id', '%50\\%\\_off%'],
      ]);
    });

    it('honours a smaller limit', async () => {
      await store.list({ status: 'all', limit: 10 });

      expect(builder.limit).toHaveBeenCalledWith(10);
    });
  });

  describe('countByStatus()', () => {
    it('parses the active and inactive counts', async () => {
      builder.first.mockResolvedValueOnce({ count: '3' }).mockResolvedValueOnce({ count: '1' });

      const counts = await store.countByStatus();

      expect(builder.count).toHaveBeenCalledWith('* as count');
      expect(builder.where).toHaveBeenCalledWith({ is_active: true });
      expect(builder.where).toHaveBeenCalledWith({ is_active: false });
      expect(counts).toEqual({ active: 3, inactive: 1 });
    });

    it('treats a missing count as zero', async () => {
      builder.first.mockResolvedValueOnce(undefined).mockResolvedValueOnce(undefined);

      expect(await store.countByStatus()).toEqual({ active: 0, inactive: 0 });
    });
  });

  describe('listActiveByName()', () => {
    it('returns active customers ordered by name', async () => {
      builder.select.mockResolvedValueOnce([makeRow({ name: 'Adam' }), makeRow({ name: 'Zoe' })]);

      const customers = await store.listActiveByName();

      expect(builder.where).toHaveBeenCalledWith({ is_active: true });
      expect(builder.orderBy).toHaveBeenCalledWith([
        { column: 'name', order: 'asc' },
        { column: 'id', order: 'asc' },
      ]);
      expect(customers.map((c) => c.name)).toEqual(['Adam', 'Zoe']);
    });
  });
});

describe('rowToCustomer()', () => {
  it('parses decimal strings and timestamp strings', () => {
    const customer = rowToCustomer(
      makeRow({
        total_spent: '100.00',
        visit_count: 4,
        last_purchase_at: '2026-02-10T12:15:00.000Z',
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-02-10T12:16:00.000Z',
        tax_id: '12345678Z',
      }),
    );

    expect(customer.totalSpent).toBe(100);
    expect(customer.visitCount).toBe(4);
    expect(customer.taxId).toBe('12345678Z');
    expect(customer.lastPurchaseAt).toEqual(new Date('2026-02-10T12:15:00.000Z'));
    expect(customer.createdAt).toEqual(new Date('2026-01-01T00:00:00.000Z'));
  });
});

describe('escapeLikePattern()', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLikePattern('a_b%c\\d')).toBe('a\\_b\\%c\\\\d');
  });

  it('leaves ordinary text alone', () => {
    expect(escapeLikePattern('Maria Lopez')).toBe('Maria Lopez');
  });
});
