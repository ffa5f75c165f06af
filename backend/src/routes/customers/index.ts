import { Readable } from 'stream';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { createTranslator, resolveLocale, type Locale, type Translator } from '../../i18n/messages.js';
import type { CustomerService, CustomerFormInput } from '../../services/customerService.js';
import { averagePurchase, customerNotFound, toListItem } from '../../services/customerService.js';
import type { CustomerStatsService } from '../../services/customerStatsService.js';
import type { CustomerExportService } from '../../services/customerExportService.js';
import { exportFilename } from '../../services/customerExportService.js';
import { buildDetailContent, buildFormContent, buildListContent } from '../../views/customerViews.js';
import { formatDateTime } from '../../utils/format.js';
import { formChecked, formString, sendFailure, sendResult, toFormRecord } from './envelope.js';
import { resolveResponseMode, sendView, type ResponseMode } from './responseMode.js';

export interface CustomerRoutesDeps {
  customerService: CustomerService;
  statsService: CustomerStatsService;
  exportService: CustomerExportService;
  defaultLocale: Locale;
  /** Public prefix the routes are mounted under, used for links. */
  basePath: string;
  now?: () => Date;
}

interface IdParams {
  id: string;
}

interface ListQuery {
  search?: string;
  status?: string;
}

const listQuerySchema = {
  querystring: {
    type: 'object' as const,
    properties: {
      search: { type: 'string' as const },
      status: { type: 'string' as const },
    },
  },
};

const RECENT_PURCHASES_ON_DETAIL = 10;

export function parseCustomerId(raw: string): number | null {
  if (!/^\d{1,15}$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return id > 0 ? id : null;
}

function readCustomerForm(body: unknown): CustomerFormInput & { isActive: boolean } {
  const record = toFormRecord(body);
  return {
    name: formString(record, 'name'),
    email: formString(record, 'email'),
    phone: formString(record, 'phone'),
    address: formString(record, 'address'),
    taxId: formString(record, 'tax_id'),
    notes: formString(record, 'notes'),
    isActive: formChecked(record, 'is_active'),
  };
}

interface RequestContext {
  mode: ResponseMode;
  locale: Locale;
  t: Translator;
}

export async function customerRoutes(fastify: FastifyInstance, deps: CustomerRoutesDeps) {
  const { customerService, statsService, exportService, defaultLocale, basePath } = deps;
  const now = deps.now ?? (() => new Date());

  function contextOf(request: FastifyRequest): RequestContext {
    const locale = resolveLocale(request.headers['accept-language'], defaultLocale);
    return { mode: resolveResponseMode(request), locale, t: createTranslator(locale) };
  }

  function pageOptions(ctx: RequestContext) {
    return { lang: ctx.locale, basePath };
  }

  // GET / — list page with active/inactive counts
  fastify.get('/', async (request, reply) => {
    const ctx = contextOf(request);
    const counts = await customerService.countCustomers();

    return sendView(
      reply,
      ctx.mode,
      {
        title: ctx.t('TITLE_LIST'),
        html: buildListContent(counts, { t: ctx.t, basePath }),
        data: { total_customers: counts.active, inactive_customers: counts.inactive },
      },
      pageOptions(ctx),
    );
  });

  // GET /api/list/ — filtered customer list as JSON, capped at 100 rows
  fastify.get<{ Querystring: ListQuery }>(
    '/api/list/',
    { schema: listQuerySchema },
    async (request, reply) => {
      const { search, status } = request.query;
      const customers = await customerService.listCustomers({ search, status });

      return reply.status(200).send({
        success: true,
        customers: customers.map(toListItem),
      });
    },
  );

  // GET /create/ — empty form
  fastify.get('/create/', async (request, reply) => {
    const ctx = contextOf(request);

    return sendView(
      reply,
      ctx.mode,
      {
        title: ctx.t('TITLE_NEW'),
        html: buildFormContent(null, { t: ctx.t, basePath }),
        data: { customer: null },
      },
      pageOptions(ctx),
    );
  });

  // POST /create/ — create from form fields
  fastify.post('/create/', async (request, reply) => {
    const ctx = contextOf(request);
    const result = await customerService.createCustomer(readCustomerForm(request.body));

    return sendResult(reply, result, ctx.locale, (customer) => ({
      message: ctx.t('CUSTOMER_CREATED'),
      customer_id: customer.id,
    }));
  });

  // GET /export/ — CSV of active customers sorted by name
  fastify.get('/export/', async (_request, reply) => {
    return reply
      .status(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${exportFilename(now())}"`)
      .send(Readable.from(exportService.streamCsv()));
  });

  // GET /:id/ — detail with recent purchases
  fastify.get<{ Params: IdParams }>('/:id/', async (request, reply) => {
    const ctx = contextOf(request);
    const id = parseCustomerId(request.params.id);
    const result = id === null ? null : await customerService.getCustomer(id);
    if (!result || !result.ok) {
      return sendFailure(reply, result ? result.error : customerNotFound(), ctx.locale);
    }

    const customer = result.value;
    const purchases = await statsService.getRecentPurchases(customer, RECENT_PURCHASES_ON_DETAIL);

    return sendView(
      reply,
      ctx.mode,
      {
        title: ctx.t('TITLE_DETAIL', { name: customer.name }),
        html: buildDetailContent(customer, purchases, { t: ctx.t, basePath }),
        data: {
          customer: toListItem(customer),
          recent_purchases: purchases.map((sale) => ({
            id: sale.id,
            total: sale.total,
            created_at: formatDateTime(sale.createdAt),
          })),
        },
      },
      pageOptions(ctx),
    );
  });

  // GET /:id/edit/ — pre-filled form
  fastify.get<{ Params: IdParams }>('/:id/edit/', async (request, reply) => {
    const ctx = contextOf(request);
    const id = parseCustomerId(request.params.id);
    const result = id === null ? null : await customerService.getCustomer(id);
    if (!result || !result.ok) {
      return sendFailure(reply, result ? result.error : customerNotFound(), ctx.locale);
    }

    const customer = result.value;
    return sendView(
      reply,
      ctx.mode,
      {
        title: ctx.t('TITLE_EDIT', { name: customer.name }),
        html: buildFormContent(customer, { t: ctx.t, basePath }),
        data: { customer: toListItem(customer) },
      },
      pageOptions(ctx),
    );
  });

  // POST /:id/edit/ — full update including the is_active checkbox
  fastify.post<{ Params: IdParams }>('/:id/edit/', async (request, reply) => {
    const ctx = contextOf(request);
    const id = parseCustomerId(request.params.id);
    if (id === null) {
      return sendFailure(reply, customerNotFound(), ctx.locale);
    }

    const result = await customerService.updateCustomer(id, readCustomerForm(request.body));
    return sendResult(reply, result, ctx.locale, () => ({
      message: ctx.t('CUSTOMER_UPDATED'),
    }));
  });

  // POST /:id/delete/ — soft delete
  fastify.post<{ Params: IdParams }>('/:id/delete/', async (request, reply) => {
    const ctx = contextOf(request);
    const id = parseCustomerId(request.params.id);
    if (id === null) {
      return sendFailure(reply, customerNotFound(), ctx.locale);
    }

    const result = await customerService.deactivateCustomer(id);
    return sendResult(reply, result, ctx.locale, () => ({
      message: ctx.t('CUSTOMER_DEACTIVATED'),
    }));
  });

  // POST /:id/update-stats/ — recompute from completed sales
  fastify.post<{ Params: IdParams }>('/:id/update-stats/', async (request, reply) => {
    const ctx = contextOf(request);
    const id = parseCustomerId(request.params.id);
    if (id === null) {
      return sendFailure(reply, customerNotFound(), ctx.locale);
    }

    const result = await statsService.refreshStats(id);
    return sendResult(reply, result, ctx.locale, (customer) => ({
      total_spent: customer.totalSpent,
      visit_count: customer.visitCount,
      average_purchase: averagePurchase(customer),
    }));
  });
}
