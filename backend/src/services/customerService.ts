import type {
  Customer,
  CustomerCounts,
  CustomerStatusFilter,
  CustomerStore,
  NewCustomer,
} from '../db/customerStore.js';
import { MAX_LIST_ROWS } from '../db/customerStore.js';
import type { MessageKey } from '../i18n/messages.js';
import { AppError, NotFoundError, ValidationError, toError } from '../utils/errors.js';
import { formatDate, formatDateTime } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';

export interface CustomerFormInput {
  name?: string;
  email?: string;
  phone?: string;
  address?: string;
  taxId?: string;
  notes?: string;
}

export interface CustomerUpdateInput extends CustomerFormInput {
  isActive: boolean;
}

export interface CustomerListQuery {
  search?: string;
  status?: string;
}

/** Shape of a customer in the `/api/list/` response. */
export interface CustomerListItem {
  id: number;
  name: string;
  phone: string;
  email: string;
  tax_id: string;
  total_spent: number;
  visit_count: number;
  average_purchase: number;
  last_purchase: string | null;
  is_active: boolean;
  created_at: string;
}

export interface CustomerServiceDeps {
  store: CustomerStore;
}

interface FieldLimit {
  field: keyof NewCustomer;
  label: MessageKey;
  maxLength: number;
}

const FIELD_LIMITS: FieldLimit[] = [
  { field: 'name', label: 'FIELD_NAME', maxLength: 255 },
  { field: 'email', label: 'FIELD_EMAIL', maxLength: 254 },
  { field: 'phone', label: 'FIELD_PHONE', maxLength: 20 },
  { field: 'taxId', label: 'FIELD_TAX_ID', maxLength: 50 },
];

const FIELD_LABELS_EN: Record<keyof NewCustomer, string> = {
  name: 'Name',
  email: 'Email',
  phone: 'Phone',
  address: 'Address',
  taxId: 'Tax ID',
  notes: 'Notes',
};

export function customerNotFound(): NotFoundError {
  return new NotFoundError('Customer not found', { code: 'CUSTOMER_NOT_FOUND' });
}

/**
 * Unknown values mean "no status filter", which is also what an empty
 * `?status=` produces.
 */
export function parseStatusFilter(raw: string | undefined): CustomerStatusFilter {
  if (raw === undefined || raw === 'active') {
    return 'active';
  }
  return raw === 'inactive' ? 'inactive' : 'all';
}

export function averagePurchase(customer: Pick<Customer, 'totalSpent' | 'visitCount'>): number {
  if (customer.visitCount > 0) {
    return customer.totalSpent / customer.visitCount;
  }
  return 0;
}

export function toListItem(customer: Customer): CustomerListItem {
  return {
    id: customer.id,
    name: customer.name,
    phone: customer.phone,
    email: customer.email,
    tax_id: customer.taxId,
    total_spent: customer.totalSpent,
    visit_count: customer.visitCount,
    average_purchase: averagePurchase(customer),
    last_purchase: customer.lastPurchaseAt ? formatDateTime(customer.lastPurchaseAt) : null,
    is_active: customer.isActive,
    created_at: formatDate(customer.createdAt),
  };
}

export function validateCustomerForm(input: CustomerFormInput): Result<NewCustomer> {
  const fields: NewCustomer = {
    name: (input.name ?? '').trim(),
    email: (input.email ?? '').trim(),
    phone: (input.phone ?? '').trim(),
    address: (input.address ?? '').trim(),
    taxId: (input.taxId ?? '').trim(),
    notes: (input.notes ?? '').trim(),
  };

  if (fields.name === '') {
    return fail(new ValidationError('Name is required', { code: 'NAME_REQUIRED' }));
  }

  for (const limit of FIELD_LIMITS) {
    if (fields[limit.field].length > limit.maxLength) {
      return fail(
        new ValidationError(
          `${FIELD_LABELS_EN[limit.field]} must be at most ${limit.maxLength} characters`,
          { code: 'FIELD_TOO_LONG', params: { field: limit.label, maxLength: limit.maxLength } },
        ),
      );
    }
  }

  return ok(fields);
}

export function createCustomerService(deps: CustomerServiceDeps) {
  const { store } = deps;

  async function guard<T>(
    code: string,
    message: string,
    logContext: Record<string, unknown>,
    operation: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    try {
      return await operation();
    } catch (err) {
      logger.error({ ...logContext, err }, message);
      return fail(new AppError(message, { code, cause: toError(err) }));
    }
  }

  async function createCustomer(input: CustomerFormInput): Promise<Result<Customer>> {
    const validated = validateCustomerForm(input);
    if (!validated.ok) {
      return validated;
    }

    return guard('CREATE_FAILED', 'Failed to create customer', { customer: validated.value }, async () => {
      const customer = await store.insert(validated.value);
      logger.info({ customerId: customer.id }, 'Customer created');
      return ok(customer);
    });
  }

  async function getCustomer(id: number): Promise<Result<Customer>> {
    const customer = await store.findById(id);
    return customer ? ok(customer) : fail(customerNotFound());
  }

  async function updateCustomer(id: number, input: CustomerUpdateInput): Promise<Result<Customer>> {
    return guard('UPDATE_FAILED', 'Failed to update customer', { customerId: id }, async () => {
      const existing = await store.findById(id);
      if (!existing) {
        return fail(customerNotFound());
      }

      const validated = validateCustomerForm(input);
      if (!validated.ok) {
        return validated;
      }

      const updated = await store.update(id, { ...validated.value, isActive: input.isActive });
      if (!updated) {
        return fail(customerNotFound());
      }

      logger.info(
        { customerId: id, isActive: updated.isActive, reactivated: !existing.isActive && updated.isActive },
        'Customer updated',
      );
      return ok(updated);
    });
  }

  async function deactivateCustomer(id: number): Promise<Result<Customer>> {
    return guard('DELETE_FAILED', 'Failed to deactivate customer', { customerId: id }, async () => {
      const updated = await store.update(id, { isActive: false });
      if (!updated) {
        return fail(customerNotFound());
      }

      logger.info({ customerId: id }, 'Customer deactivated');
      return ok(updated);
    });
  }

  async function listCustomers(query: CustomerListQuery): Promise<Customer[]> {
    return store.list({
      status: parseStatusFilter(query.status),
      search: query.search?.trim() ?? '',
      limit: MAX_LIST_ROWS,
    });
  }

  async function countCustomers(): Promise<CustomerCounts> {
    return store.countByStatus();
  }

  return {
    createCustomer,
    getCustomer,
    updateCustomer,
    deactivateCustomer,
    listCustomers,
    countCustomers,
  };
}

export type CustomerService = ReturnType<typeof createCustomerService>;
