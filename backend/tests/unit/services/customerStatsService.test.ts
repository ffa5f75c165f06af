import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type { CustomerStore } from '../../../src/db/customerStore.js';
import {
  createInMemoryCustomerStore,
  createInMemorySalesSource,
  newCustomerInput,
  type InMemoryCustomerStore,
  type SaleInput,
} from '../../helpers/inMemoryStores.js';

// ── Mock logger before importing the module under test ──────────────

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const { createCustomerStatsService, DEFAULT_RECENT_PURCHASES_LIMIT } = await import(
  '../../../src/services/customerStatsService.js'
);
const { NotFoundError } = await import('../../../src/utils/errors.js');

// ── Helpers ─────────────────────────────────────────────────────────

function sale(customerName: string, total: number, isoDate: string, status = 'completed'): SaleInput {
  return { customerName, status, total, createdAt: new Date(isoDate) };
}

const SALES: SaleInput[] = [
  sale('Maria Lopez', 40, '2026-02-01T10:00:00.000Z'),
  sale('Maria Lopez', 35.5, '2026-02-10T12:15:00.000Z'),
  sale('Maria Lopez', 24.5, '2026-01-20T08:00:00.000Z'),
  sale('Maria Lopez', 99, '2026-02-20T09:00:00.000Z', 'cancelled'),
  sale('maria lopez', 10, '2026-02-21T09:00:00.000Z'),
  sale('Pedro Ruiz', 12, '2026-02-05T16:00:00.000Z'),
];

// ── Tests ───────────────────────────────────────────────────────────

describe('customerStatsService', () => {
  let store: InMemoryCustomerStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = createInMemoryCustomerStore();
  });

  describe('updateStats() with a sales source', () => {
    it('derives visit count, total and last purchase from completed sales with the same name', async () => {
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(SALES) });
      const customer = await store.insert(newCustomerInput({ name: 'Maria Lopez' }));

      const updated = await service.updateStats(customer);

      expect(updated.visitCount).toBe(3);
      expect(updated.totalSpent).toBe(100);
      expect(updated.lastPurchaseAt).toEqual(new Date('2026-02-10T12:15:00.000Z'));
      expect(store.rows[0]).toMatchObject({ visitCount: 3, totalSpent: 100 });
    });

    it('zeroes the totals and keeps the last purchase date when no sale matches', async () => {
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(SALES) });
      const inserted = await store.insert(newCustomerInput({ name: 'Nobody' }));
      const lastPurchaseAt = new Date('2025-12-24T18:00:00.000Z');
      const customer = await store.update(inserted.id, { visitCount: 2, totalSpent: 30, lastPurchaseAt });
      if (!customer) throw new Error('setup failed');

      const updated = await service.updateStats(customer);

      expect(updated.visitCount).toBe(0);
      expect(updated.totalSpent).toBe(0);
      expect(updated.lastPurchaseAt).toEqual(lastPurchaseAt);
    });

    it('loses attribution after a rename because sales match by name', async () => {
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(SALES) });
      const inserted = await store.insert(newCustomerInput({ name: 'Pedro Ruiz' }));
      const renamed = await store.update(inserted.id, { name: 'Pedro Ruiz Garcia' });
      if (!renamed) throw new Error('setup failed');

      const updated = await service.updateStats(renamed);

      expect(updated.visitCount).toBe(0);
    });
  });

  describe('updateStats() without a sales source', () => {
    it('leaves the totals unchanged and does not throw', async () => {
      const service = createCustomerStatsService({ store, salesSource: null });
      const customer = await store.insert(newCustomerInput({ name: 'Test' }));

      const updated = await service.updateStats(customer);

      expect(updated).toEqual(customer);
      expect(store.rows[0].totalSpent).toBe(0);
      expect(store.rows[0].visitCount).toBe(0);
      expect(store.rows[0].updatedAt).toEqual(customer.updatedAt);
    });
  });

  describe('getRecentPurchases()', () => {
    it('returns completed sales newest first up to the limit', async () => {
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(SALES) });
      const customer = await store.insert(newCustomerInput({ name: 'Maria Lopez' }));

      const purchases = await service.getRecentPurchases(customer, 2);

      expect(purchases.map((p) => p.total)).toEqual([35.5, 40]);
    });

    it('defaults to ten purchases', async () => {
      const many = Array.from({ length: 12 }, (_, i) =>
        sale('Frequent', 5, `2026-01-${String(i + 1).padStart(2, '0')}T10:00:00.000Z`),
      );
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(many) });
      const customer = await store.insert(newCustomerInput({ name: 'Frequent' }));

      const purchases = await service.getRecentPurchases(customer);

      expect(DEFAULT_RECENT_PURCHASES_LIMIT).toBe(10);
      expect(purchases).toHaveLength(10);
      expect(purchases[0].createdAt).toEqual(new Date('2026-01-12T10:00:00.000Z'));
    });

    it('returns an empty list without a sales source', async () => {
      const service = createCustomerStatsService({ store, salesSource: null });
      const customer = await store.insert(newCustomerInput({ name: 'Test' }));

      expect(await service.getRecentPurchases(customer)).toEqual([]);
    });
  });

  describe('refreshStats()', () => {
    it('looks the customer up and updates it', async () => {
      const service = createCustomerStatsService({ store, salesSource: createInMemorySalesSource(SALES) });
      const customer = await store.insert(newCustomerInput({ name: 'Pedro Ruiz' }));

      const result = await service.refreshStats(customer.id);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.visitCount).toBe(1);
      expect(result.value.totalSpent).toBe(12);
    });

    it('returns a not-found error for an unknown id', async () => {
      const service = createCustomerStatsService({ store, salesSource: null });

      const result = await service.refreshStats(404);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
    });

    it('wraps sales source failures in a STATS_FAILED error', async () => {
      const salesSource = createInMemorySalesSource([]);
      salesSource.summarizeCompleted = jest
        .fn<typeof salesSource.summarizeCompleted>()
        .mockRejectedValue(new Error('relation "sales" does not exist'));
      const service = createCustomerStatsService({ store, salesSource });
      const customer = await store.insert(newCustomerInput({ name: 'Broken' }));

      const result = await service.refreshStats(customer.id);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('STATS_FAILED');
      expect(result.error.message).toBe('Failed to update customer stats');
    });

    it('wraps store failures in a STATS_FAILED error', async () => {
      const failingStore: CustomerStore = {
        ...store,
        findById: jest.fn<CustomerStore['findById']>().mockRejectedValue(new Error('pool exhausted')),
      };
      const service = createCustomerStatsService({ store: failingStore, salesSource: null });

      const result = await service.refreshStats(1);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('STATS_FAILED');
    });
  });

  it('reports whether a sales source is wired', () => {
    expect(createCustomerStatsService({ store, salesSource: null }).hasSalesSource).toBe(false);
    expect(
      createCustomerStatsService({ store, salesSource: createInMemorySalesSource([]) }).hasSalesSource,
    ).toBe(true);
  });
});
