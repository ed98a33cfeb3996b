/**
 * sql.js loader
 *
 * Loads the sql.js WASM module once, on first use.
 */

import type { SqlJsStatic } from 'sql.js';
import { createRequire } from 'module';

// Cached promise for lazy-loaded sql.js
let sqlJsPromise: Promise<SqlJsStatic> | null = null;

export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = (async () => {
      const { default: initSqlJs } = await import('sql.js');
      const require = createRequire(import.meta.url);

      return initSqlJs({
        locateFile: (file: string) => require.resolve(`sql.js/dist/${file}`),
      });
    })();

    // A failed load must not poison later attempts
    sqlJsPromise.catch(() => {
      sqlJsPromise = null;
    });
  }
  return sqlJsPromise;
}
