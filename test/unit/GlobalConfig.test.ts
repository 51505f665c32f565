/**
 * GlobalConfig Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Expr } from '../../src/Expr';
import {
  getGlobalFilter,
  getGlobalSoftDeleteField,
  resetGlobalConfig,
  setConfigLogger,
  setGlobalFilter,
  setGlobalSoftDeleteField,
} from '../../src/GlobalConfig';
import { defaultLogger, type Logger } from '../../src/drivers/types';

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('GlobalConfig', () => {
  afterEach(() => {
    resetGlobalConfig();
    setConfigLogger(defaultLogger);
  });

  it('should start unset', () => {
    expect(getGlobalSoftDeleteField()).toBeNull();
    expect(getGlobalFilter()).toBeNull();
  });

  it('should set the soft-delete field once', () => {
    const logger = createLogger();
    setConfigLogger(logger);

    expect(setGlobalSoftDeleteField('deleted', ['audit_log'])).toBe(true);
    expect(setGlobalSoftDeleteField('removed')).toBe(false);

    expect(getGlobalSoftDeleteField()).toEqual({ field: 'deleted', excludeTables: ['audit_log'] });
    expect(logger.warn).toHaveBeenCalledWith(
      'Global soft delete field is already set to "deleted"; ignoring "removed"'
    );
  });

  it('should set the global filter once', () => {
    const logger = createLogger();
    setConfigLogger(logger);
    const tenant = Expr.fromStr('tenant_id = 1');

    expect(setGlobalFilter(tenant)).toBe(true);
    expect(setGlobalFilter(Expr.fromStr('tenant_id = 2'))).toBe(false);

    expect(getGlobalFilter()?.expr.build().sql).toBe('tenant_id = 1');
    expect(getGlobalFilter()?.excludeTables).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Global filter is already set; ignoring the new filter');
  });

  it('should copy the exclude list', () => {
    const excluded = ['a'];
    setGlobalSoftDeleteField('deleted', excluded);
    excluded.push('b');
    expect(getGlobalSoftDeleteField()?.excludeTables).toEqual(['a']);
  });
});
