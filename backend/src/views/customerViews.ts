import type { Customer, CustomerCounts } from '../db/customerStore.js';
import type { SaleRecord } from '../db/salesSource.js';
import type { Translator } from '../i18n/messages.js';
import { averagePurchase } from '../services/customerService.js';
import { formatDate, formatDateTime, formatMoney } from '../utils/format.js';
import { escapeHtml } from './html.js';

export interface ViewContext {
  t: Translator;
  basePath: string;
}

// Submits [data-json-form] forms as urlencoded POSTs and fills the list table
// from the JSON list endpoint. Delegated so it also covers HTMX-swapped content.
const CLIENT_SCRIPT = `<script>
(function () {
  if (window.__customersWired) return;
  window.__customersWired = true;
  document.addEventListener('submit', async function (event) {
    var form = event.target;
    if (!(form instanceof HTMLFormElement) || !form.hasAttribute('data-json-form')) return;
    event.preventDefault();
    var response = await fetch(form.action, { method: 'POST', body: new URLSearchParams(new FormData(form)) });
    var body = await response.json();
    var status = form.querySelector('[data-form-status]');
    if (body.success) {
      var target = form.getAttribute('data-redirect');
      if (!target && body.customer_id) target = form.getAttribute('data-base') + '/' + body.customer_id + '/';
      window.location.href = target || window.location.href;
    } else if (status) {
      status.textContent = body.error;
    }
  });
  window.loadCustomers = async function (form) {
    var table = document.querySelector('[data-customer-rows]');
    if (!table) return;
    var params = new URLSearchParams(new FormData(form));
    var response = await fetch(form.action + '?' + params.toString());
    var body = await response.json();
    table.replaceChildren();
    (body.customers || []).forEach(function (c) {
      var row = document.createElement('tr');
      [c.name, c.phone, c.email, c.tax_id, c.total_spent.toFixed(2), c.visit_count, c.last_purchase || ''].forEach(function (v) {
        var cell = document.createElement('td');
        cell.textContent = String(v);
        row.appendChild(cell);
      });
      row.addEventListener('click', function () { window.location.href = form.getAttribute('data-base') + '/' + c.id + '/'; });
      table.appendChild(row);
    });
  };
})();
</script>`;

export function buildListContent(counts: CustomerCounts, ctx: ViewContext): string {
  const { t, basePath } = ctx;
  const base = escapeHtml(basePath);

  return `<h1>${escapeHtml(t('TITLE_LIST'))}</h1>
<div class="cards">
  <div class="card"><strong data-count="active">${counts.active}</strong>${escapeHtml(t('LABEL_ACTIVE_CUSTOMERS'))}</div>
  <div class="card"><strong data-count="inactive">${counts.inactive}</strong>${escapeHtml(t('LABEL_INACTIVE_CUSTOMERS'))}</div>
</div>
<div class="actions">
  <a href="${base}/create/" hx-get="${base}/create/" hx-target="#content" hx-push-url="true">${escapeHtml(t('ACTION_NEW'))}</a>
  <a href="${base}/export/">${escapeHtml(t('ACTION_EXPORT'))}</a>
</div>
<form action="${base}/api/list/" data-base="${base}" onsubmit="event.preventDefault(); window.loadCustomers(this);">
  <input type="search" name="search" placeholder="${escapeHtml(t('LABEL_SEARCH'))}">
  <select name="status" onchange="window.loadCustomers(this.form)">
    <option value="active">${escapeHtml(t('FIELD_ACTIVE'))}</option>
    <option value="inactive">${escapeHtml(t('LABEL_INACTIVE_CUSTOMERS'))}</option>
    <option value="all">${escapeHtml(t('LABEL_STATUS_ALL'))}</option>
  </select>
  <button type="submit">${escapeHtml(t('LABEL_SEARCH'))}</button>
</form>
<table>
  <thead>
    <tr>
      <th>${escapeHtml(t('FIELD_NAME'))}</th>
      <th>${escapeHtml(t('FIELD_PHONE'))}</th>
      <th>${escapeHtml(t('FIELD_EMAIL'))}</th>
      <th>${escapeHtml(t('FIELD_TAX_ID'))}</th>
      <th>${escapeHtml(t('FIELD_TOTAL_SPENT'))}</th>
      <th>${escapeHtml(t('FIELD_VISIT_COUNT'))}</th>
      <th>${escapeHtml(t('FIELD_LAST_PURCHASE'))}</th>
    </tr>
  </thead>
  <tbody data-customer-rows></tbody>
</table>
${CLIENT_SCRIPT}
<script>window.loadCustomers(document.querySelector('form[data-base]'));</script>`;
}

function textInput(name: string, label: string, value: string, type = 'text'): string {
  return `<label for="field-${name}">${escapeHtml(label)}</label>
  <input id="field-${name}" type="${type}" name="${name}" value="${escapeHtml(value)}">`;
}

function textArea(name: string, label: string, value: string): string {
  return `<label for="field-${name}">${escapeHtml(label)}</label>
  <textarea id="field-${name}" name="${name}" rows="3">${escapeHtml(value)}</textarea>`;
}

/** Create form when `customer` is null, edit form otherwise. */
export function buildFormContent(customer: Customer | null, ctx: ViewContext): string {
  const { t, basePath } = ctx;
  const base = escapeHtml(basePath);
  const title = customer ? t('TITLE_EDIT', { name: customer.name }) : t('TITLE_NEW');
  const action = customer ? `${base}/${customer.id}/edit/` : `${base}/create/`;
  const redirect = customer ? ` data-redirect="${base}/${customer.id}/"` : '';
  const activeField = customer
    ? `<label><input type="checkbox" name="is_active"${customer.isActive ? ' checked' : ''}> ${escapeHtml(t('FIELD_ACTIVE'))}</label>`
    : '';

  return `<h1>${escapeHtml(title)}</h1>
<form method="post" action="${action}" data-json-form data-base="${base}"${redirect}>
  ${textInput('name', t('FIELD_NAME'), customer?.name ?? '')}
  ${textInput('email', t('FIELD_EMAIL'), customer?.email ?? '', 'email')}
  ${textInput('phone', t('FIELD_PHONE'), customer?.phone ?? '')}
  ${textArea('address', t('FIELD_ADDRESS'), customer?.address ?? '')}
  ${textInput('tax_id', t('FIELD_TAX_ID'), customer?.taxId ?? '')}
  ${textArea('notes', t('FIELD_NOTES'), customer?.notes ?? '')}
  ${activeField}
  <p data-form-status role="alert"></p>
  <button type="submit">${escapeHtml(t('ACTION_SAVE'))}</button>
</form>
${CLIENT_SCRIPT}`;
}

function purchasesTable(purchases: SaleRecord[], t: Translator): string {
  if (purchases.length === 0) {
    return `<p>${escapeHtml(t('LABEL_NO_PURCHASES'))}</p>`;
  }
  const rows = purchases
    .map(
      (sale) =>
        `<tr><td>${escapeHtml(formatDateTime(sale.createdAt))}</td><td>${escapeHtml(formatMoney(sale.total))}</td></tr>`,
    )
    .join('\n    ');

  return `<table>
  <thead><tr><th>${escapeHtml(t('LABEL_DATE'))}</th><th>${escapeHtml(t('LABEL_TOTAL'))}</th></tr></thead>
  <tbody>
    ${rows}
  </tbody>
</table>`;
}

export function buildDetailContent(
  customer: Customer,
  purchases: SaleRecord[],
  ctx: ViewContext,
): string {
  const { t, basePath } = ctx;
  const base = escapeHtml(basePath);
  const self = `${base}/${customer.id}/`;

  const facts: Array<[string, string]> = [
    [t('FIELD_EMAIL'), customer.email],
    [t('FIELD_PHONE'), customer.phone],
    [t('FIELD_ADDRESS'), customer.address],
    [t('FIELD_TAX_ID'), customer.taxId],
    [t('FIELD_NOTES'), customer.notes],
    [t('FIELD_TOTAL_SPENT'), formatMoney(customer.totalSpent)],
    [t('FIELD_VISIT_COUNT'), String(customer.visitCount)],
    [t('FIELD_AVERAGE_PURCHASE'), formatMoney(averagePurchase(customer))],
    [t('FIELD_LAST_PURCHASE'), customer.lastPurchaseAt ? formatDateTime(customer.lastPurchaseAt) : '-'],
    [t('FIELD_CREATED_AT'), formatDate(customer.createdAt)],
  ];

  const factRows = facts
    .map(([label, value]) => `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(value)}</td></tr>`)
    .join('\n    ');

  const deactivate = customer.isActive
    ? `<form method="post" action="${self}delete/" data-json-form data-redirect="${base}/"><button type="submit">${escapeHtml(t('ACTION_DEACTIVATE'))}</button><span data-form-status role="alert"></span></form>`
    : '';

  return `<h1>${escapeHtml(t('TITLE_DETAIL', { name: customer.name }))}</h1>
<div class="actions">
  <a href="${self}edit/" hx-get="${self}edit/" hx-target="#content" hx-push-url="true">${escapeHtml(t('ACTION_EDIT'))}</a>
  <form method="post" action="${self}update-stats/" data-json-form data-redirect="${self}"><button type="submit">${escapeHtml(t('ACTION_UPDATE_STATS'))}</button><span data-form-status role="alert"></span></form>
  ${deactivate}
</div>
<table>
    ${factRows}
</table>
<h2>${escapeHtml(t('LABEL_RECENT_PURCHASES'))}</h2>
${purchasesTable(purchases, t)}
${CLIENT_SCRIPT}`;
}
