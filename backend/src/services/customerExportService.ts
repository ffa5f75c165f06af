import type { Customer, CustomerStore } from '../db/customerStore.js';
import { formatCompactDate, formatDate, formatMoney } from '../utils/format.js';
import { logger } from '../utils/logger.js';

export const CSV_HEADER = [
  'Name',
  'Email',
  'Phone',
  'Tax ID',
  'Total Spent',
  'Visit Count',
  'Created At',
] as const;

const LINE_END = '\r\n';

export interface CustomerExportServiceDeps {
  store: CustomerStore;
}

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"';
  }
  return str;
}

function toCsvLine(values: readonly unknown[]): string {
  return values.map(escapeCsvValue).join(',') + LINE_END;
}

export function customerToCsvRow(customer: Customer): string[] {
  return [
    customer.name,
    customer.email,
    customer.phone,
    customer.taxId,
    formatMoney(customer.totalSpent),
    String(customer.visitCount),
    formatDate(customer.createdAt),
  ];
}

export function exportFilename(now: Date): string {
  return `customers_${formatCompactDate(now)}.csv`;
}

export function createCustomerExportService(deps: CustomerExportServiceDeps) {
  const { store } = deps;

  /** Yields the header line, then one line per active customer by name. */
  async function* streamCsv(): AsyncGenerator<string> {
    yield toCsvLine(CSV_HEADER);

    const customers = await store.listActiveByName();
    for (const customer of customers) {
      yield toCsvLine(customerToCsvRow(customer));
    }

    logger.info({ rowCount: customers.length }, 'Customer CSV exported');
  }

  async function exportCsv(): Promise<string> {
    let csv = '';
    for await (const line of streamCsv()) {
      csv += line;
    }
    return csv;
  }

  return {
    streamCsv,
    exportCsv,
  };
}

export type CustomerExportService = ReturnType<typeof createCustomerExportService>;
