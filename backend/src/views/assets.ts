import { createRequire } from 'node:module';
import { basename, dirname } from 'node:path';

const require = createRequire(import.meta.url);
const htmxEntry = require.resolve('htmx.org');

/** Directory served under `<mountPath>/static/`. */
export const ASSETS_ROOT = dirname(htmxEntry);
export const HTMX_FILE = basename(htmxEntry);

export function htmxScriptUrl(basePath: string): string {
  return `${basePath}/static/${HTMX_FILE}`;
}
