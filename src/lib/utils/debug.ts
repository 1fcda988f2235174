import chalk from 'chalk';

const DEBUG = process.env.PROVISION_DEBUG ?? '';

/**
 * Debug logger to stderr, gated by PROVISION_DEBUG.
 * `*` enables every namespace; any other value is a prefix, so `actions` or
 * `actions*` both match `actions:command`.
 */
export function debug(namespace: string, ...args: unknown[]): void {
  if (!DEBUG) return;
  if (DEBUG === '*' || namespace.startsWith(DEBUG.replace('*', ''))) {
    console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
  }
}
