/**
 * querykit - Process-wide Table Defaults
 *
 * Soft-delete column and global filter shared by every table facade that does not
 * configure its own. Each value can be set once; later sets are ignored with a warning.
 */

import type { Expr } from './Expr';
import { defaultLogger, type Logger } from './drivers/types';

export interface SoftDeleteConfig {
  /** Boolean column marking a row as deleted */
  field: string;
  /** Tables that do not use soft delete */
  excludeTables: string[];
}

export interface GlobalFilterConfig<V> {
  /** Condition ANDed onto every filtered statement */
  expr: Expr<V>;
  excludeTables: string[];
}

let softDeleteConfig: SoftDeleteConfig | null = null;
let globalFilterConfig: GlobalFilterConfig<never> | null = null;
let logger: Logger = defaultLogger;

/**
 * Logger used for configuration warnings
 * @internal
 */
export function setConfigLogger(newLogger: Logger): void {
  logger = newLogger;
}

/**
 * Set the soft-delete column for every table not listed in excludeTables
 * @returns false when a soft-delete column was already set
 */
export function setGlobalSoftDeleteField(field: string, excludeTables: string[] = []): boolean {
  if (softDeleteConfig) {
    logger.warn(`Global soft delete field is already set to "${softDeleteConfig.field}"; ignoring "${field}"`);
    return false;
  }
  softDeleteConfig = { field, excludeTables: [...excludeTables] };
  return true;
}

/**
 * Set a filter ANDed onto reads, updates and deletes of every table not in excludeTables.
 * The expression carries no bound values (e.g. `Expr.fromStr('tenant_id = 1')`) so that it
 * fits builders of every dialect.
 * @returns false when a global filter was already set
 */
export function setGlobalFilter(expr: Expr<never>, excludeTables: string[] = []): boolean {
  if (globalFilterConfig) {
    logger.warn('Global filter is already set; ignoring the new filter');
    return false;
  }
  globalFilterConfig = { expr, excludeTables: [...excludeTables] };
  return true;
}

export function getGlobalSoftDeleteField(): SoftDeleteConfig | null {
  return softDeleteConfig;
}

export function getGlobalFilter(): GlobalFilterConfig<never> | null {
  return globalFilterConfig;
}

/**
 * Clear both settings
 * @internal For tests
 */
export function resetGlobalConfig(): void {
  softDeleteConfig = null;
  globalFilterConfig = null;
}
