/**
 * User-facing strings for the customer pages and JSON envelopes.
 *
 * Error codes double as message keys, so an `AppError` raised with code
 * `NAME_REQUIRED` is shown to the user as `messages[locale].NAME_REQUIRED`.
 */

export const SUPPORTED_LOCALES = ['en', 'es'] as const;

export type Locale = (typeof SUPPORTED_LOCALES)[number];

const en = {
  NAME_REQUIRED: 'Name is required',
  FIELD_TOO_LONG: '{field} must be at most {maxLength} characters',
  CUSTOMER_NOT_FOUND: 'Customer not found',
  CREATE_FAILED: 'Could not create the customer',
  UPDATE_FAILED: 'Could not update the customer',
  DELETE_FAILED: 'Could not deactivate the customer',
  STATS_FAILED: 'Could not update the customer statistics',
  CUSTOMER_CREATED: 'Customer created successfully',
  CUSTOMER_UPDATED: 'Customer updated successfully',
  CUSTOMER_DEACTIVATED: 'Customer deactivated successfully',
  TITLE_LIST: 'Customers',
  TITLE_NEW: 'New Customer',
  TITLE_DETAIL: 'Customer: {name}',
  TITLE_EDIT: 'Edit: {name}',
  FIELD_NAME: 'Name',
  FIELD_EMAIL: 'Email',
  FIELD_PHONE: 'Phone',
  FIELD_ADDRESS: 'Address',
  FIELD_TAX_ID: 'Tax ID',
  FIELD_NOTES: 'Notes',
  FIELD_ACTIVE: 'Active',
  FIELD_TOTAL_SPENT: 'Total Spent',
  FIELD_VISIT_COUNT: 'Visit Count',
  FIELD_AVERAGE_PURCHASE: 'Average Purchase',
  FIELD_LAST_PURCHASE: 'Last Purchase',
  FIELD_CREATED_AT: 'Created At',
  LABEL_ACTIVE_CUSTOMERS: 'Active customers',
  LABEL_INACTIVE_CUSTOMERS: 'Inactive customers',
  LABEL_SEARCH: 'Search',
  LABEL_STATUS_ALL: 'All',
  LABEL_RECENT_PURCHASES: 'Recent purchases',
  LABEL_NO_PURCHASES: 'No purchases yet',
  LABEL_DATE: 'Date',
  LABEL_TOTAL: 'Total',
  ACTION_SAVE: 'Save',
  ACTION_EDIT: 'Edit',
  ACTION_EXPORT: 'Export CSV',
  ACTION_NEW: 'New customer',
  ACTION_UPDATE_STATS: 'Update statistics',
  ACTION_DEACTIVATE: 'Deactivate',
} as const;

export type MessageKey = keyof typeof en;

const es: Record<MessageKey, string> = {
  NAME_REQUIRED: 'El nombre es obligatorio',
  FIELD_TOO_LONG: '{field} no puede superar {maxLength} caracteres',
  CUSTOMER_NOT_FOUND: 'Cliente no encontrado',
  CREATE_FAILED: 'No se pudo crear el cliente',
  UPDATE_FAILED: 'No se pudo actualizar el cliente',
  DELETE_FAILED: 'No se pudo desactivar el cliente',
  STATS_FAILED: 'No se pudieron actualizar las estadísticas del cliente',
  CUSTOMER_CREATED: 'Cliente creado correctamente',
  CUSTOMER_UPDATED: 'Cliente actualizado correctamente',
  CUSTOMER_DEACTIVATED: 'Cliente desactivado correctamente',
  TITLE_LIST: 'Clientes',
  TITLE_NEW: 'Nuevo Cliente',
  TITLE_DETAIL: 'Cliente: {name}',
  TITLE_EDIT: 'Editar: {name}',
  FIELD_NAME: 'Nombre',
  FIELD_EMAIL: 'Email',
  FIELD_PHONE: 'Teléfono',
  FIELD_ADDRESS: 'Dirección',
  FIELD_TAX_ID: 'NIF/CIF',
  FIELD_NOTES: 'Notas',
  FIELD_ACTIVE: 'Activo',
  FIELD_TOTAL_SPENT: 'Total gastado',
  FIELD_VISIT_COUNT: 'Visitas',
  FIELD_AVERAGE_PURCHASE: 'Compra media',
  FIELD_LAST_PURCHASE: 'Última compra',
  FIELD_CREATED_AT: 'Fecha de alta',
  LABEL_ACTIVE_CUSTOMERS: 'Clientes activos',
  LABEL_INACTIVE_CUSTOMERS: 'Clientes inactivos',
  LABEL_SEARCH: 'Buscar',
  LABEL_STATUS_ALL: 'Todos',
  LABEL_RECENT_PURCHASES: 'Compras recientes',
  LABEL_NO_PURCHASES: 'Sin compras todavía',
  LABEL_DATE: 'Fecha',
  LABEL_TOTAL: 'Total',
  ACTION_SAVE: 'Guardar',
  ACTION_EDIT: 'Editar',
  ACTION_EXPORT: 'Exportar CSV',
  ACTION_NEW: 'Nuevo cliente',
  ACTION_UPDATE_STATS: 'Actualizar estadísticas',
  ACTION_DEACTIVATE: 'Desactivar',
};

const catalogs: Record<Locale, Record<MessageKey, string>> = { en, es };

export type MessageParams = Record<string, string | number>;

export function isMessageKey(key: string): key is MessageKey {
  return Object.prototype.hasOwnProperty.call(en, key);
}

export function translate(locale: Locale, key: MessageKey, params: MessageParams = {}): string {
  const template = catalogs[locale][key];
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = params[name];
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Picks the first supported language from an Accept-Language header,
 * honouring q-values. Falls back to `fallback` when nothing matches.
 */
export function resolveLocale(acceptLanguage: string | undefined, fallback: Locale): Locale {
  if (!acceptLanguage) {
    return fallback;
  }

  const ranked = acceptLanguage
    .split(',')
    .map((part, index) => {
      const [tag = '', ...attrs] = part.trim().split(';');
      const qAttr = attrs.find((attr) => attr.trim().startsWith('q='));
      const q = qAttr ? parseFloat(qAttr.trim().slice(2)) : 1;
      return { language: tag.toLowerCase().split('-')[0], q: Number.isNaN(q) ? 0 : q, index };
    })
    .filter((entry) => entry.q > 0)
    .sort((a, b) => b.q - a.q || a.index - b.index);

  for (const entry of ranked) {
    const match = SUPPORTED_LOCALES.find((locale) => locale === entry.language);
    if (match) {
      return match;
    }
  }
  return fallback;
}

export type Translator = (key: MessageKey, params?: MessageParams) => string;

export function createTranslator(locale: Locale): Translator {
  return (key, params) => translate(locale, key, params);
}
