import type { FastifyReply, FastifyRequest } from 'fastify';
import { buildPageHtml } from '../../views/html.js';

export type ResponseMode = 'page' | 'partial' | 'json';

/** What a page route produces; each response mode renders one part of it. */
export interface PageView {
  title: string;
  html: string;
  data: Record<string, unknown>;
}

export interface PageRenderOptions {
  lang: string;
  basePath: string;
}

function firstHeader(value: string | string[] | undefined): string {
  return (Array.isArray(value) ? value[0] : value) ?? '';
}

/**
 * HTMX navigation sends `HX-Request`; it gets the fragment only. Clients that
 * accept JSON but not HTML get the view's data.
 */
export function resolveResponseMode(request: Pick<FastifyRequest, 'headers'>): ResponseMode {
  if (firstHeader(request.headers['hx-request']) !== '') {
    return 'partial';
  }
  const accept = firstHeader(request.headers.accept).toLowerCase();
  if (accept.includes('application/json') && !accept.includes('text/html')) {
    return 'json';
  }
  return 'page';
}

export function renderPage(view: PageView, options: PageRenderOptions): string {
  return buildPageHtml(view.html, { title: view.title, ...options });
}

export function renderPartial(view: PageView): string {
  return view.html;
}

export function renderJson(view: PageView): Record<string, unknown> {
  return { success: true, ...view.data };
}

export function sendView(
  reply: FastifyReply,
  mode: ResponseMode,
  view: PageView,
  options: PageRenderOptions,
): FastifyReply {
  switch (mode) {
    case 'json':
      return reply.status(200).send(renderJson(view));
    case 'partial':
      return reply.status(200).type('text/html; charset=utf-8').send(renderPartial(view));
    case 'page':
      return reply.status(200).type('text/html; charset=utf-8').send(renderPage(view, options));
  }
}
