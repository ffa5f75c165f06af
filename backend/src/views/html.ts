import { htmxScriptUrl } from './assets.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export interface LayoutOptions {
  title: string;
  lang: string;
  basePath: string;
}

export function buildPageHtml(content: string, options: LayoutOptions): string {
  return `<!DOCTYPE html>
<html lang="${escapeHtml(options.lang)}">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(options.title)}</title>
  <script src="${escapeHtml(htmxScriptUrl(options.basePath))}"></script>
  <style>
    *, *::before, *::after { box-sizing: border-box; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Oxygen, Ubuntu, Cantarell, sans-serif;
      line-height: 1.5;
      color: #1f2933;
      background: #f5f7fa;
      margin: 0;
    }
    header { background: #1f4e79; color: #fff; padding: 1rem 1.5rem; }
    header a { color: #fff; text-decoration: none; font-weight: 700; }
    main { max-width: 1080px; margin: 1.5rem auto; padding: 0 1.5rem; }
    table { width: 100%; border-collapse: collapse; background: #fff; }
    th, td { text-align: left; padding: 0.5rem 0.75rem; border-bottom: 1px solid #e4e7eb; }
    .cards { display: flex; gap: 1rem; margin-bottom: 1.5rem; }
    .card { background: #fff; border-radius: 8px; padding: 1rem 1.5rem; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
    .card strong { display: block; font-size: 1.75rem; }
    .actions { display: flex; gap: 0.75rem; margin: 1rem 0; }
    form label { display: block; margin-top: 0.75rem; font-weight: 600; }
    form input[type="text"], form input[type="email"], form textarea { width: 100%; padding: 0.5rem; }
  </style>
</head>
<body>
  <header><a href="${escapeHtml(options.basePath)}/" hx-boost="true" hx-target="#content">${escapeHtml(options.title)}</a></header>
  <main id="content">
${content}
  </main>
</body>
</html>`;
}
