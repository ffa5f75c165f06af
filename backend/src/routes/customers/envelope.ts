import type { FastifyReply } from 'fastify';
import { isMessageKey, translate, type Locale, type MessageParams } from '../../i18n/messages.js';
import { NotFoundError, type AppError } from '../../utils/errors.js';
import type { Result } from '../../utils/result.js';

export interface FailureBody {
  success: false;
  error: string;
}

export function localizeError(error: AppError, locale: Locale): string {
  const code = error.code;
  if (!isMessageKey(code)) {
    return error.message;
  }
  const params: MessageParams = {};
  for (const [name, value] of Object.entries(error.params)) {
    params[name] = typeof value === 'string' && isMessageKey(value) ? translate(locale, value) : value;
  }
  return translate(locale, code, params);
}

/**
 * Not-found is the only failure with a non-2xx status: validation and
 * internal failures are reported in the body with 200.
 */
export function sendFailure(reply: FastifyReply, error: AppError, locale: Locale): FastifyReply {
  const status = error instanceof NotFoundError ? 404 : 200;
  const body: FailureBody = { success: false, error: localizeError(error, locale) };
  return reply.status(status).send(body);
}

export function sendResult<T>(
  reply: FastifyReply,
  result: Result<T>,
  locale: Locale,
  toBody: (value: T) => Record<string, unknown>,
): FastifyReply {
  if (!result.ok) {
    return sendFailure(reply, result.error, locale);
  }
  return reply.status(200).send({ success: true, ...toBody(result.value) });
}

type FormRecord = Record<string, unknown>;

export function toFormRecord(body: unknown): FormRecord {
  if (typeof body !== 'object' || body === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

/** Repeated form keys arrive as arrays; the last value wins. */
export function formString(record: FormRecord, key: string): string | undefined {
  const value = record[key];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' ? last : undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/** An HTML checkbox posts `on`; JSON clients may send a boolean. */
export function formChecked(record: FormRecord, key: string): boolean {
  const value = formString(record, key);
  return value === 'on' || value === 'true';
}
