import { describe, it, expect } from 'vitest';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('defaults to warn-level logging and standard timeouts', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'warn',
      debug: false,
      installTimeout: 600000,
      zipTimeout: 300000,
    });
  });

  it('switches to debug logging with PYLAYER_DEBUG', () => {
    expect(loadConfig({ PYLAYER_DEBUG: 'true' }).logLevel).toBe('debug');
  });

  it('prefers an explicit LOG_LEVEL', () => {
    expect(loadConfig({ PYLAYER_DEBUG: 'true', LOG_LEVEL: 'info' }).logLevel).toBe('info');
  });

  it('parses timeouts as milliseconds', () => {
    expect(loadConfig({ PYLAYER_INSTALL_TIMEOUT: '1200000' }).installTimeout).toBe(1200000);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadConfig({ PYLAYER_ZIP_TIMEOUT: 'soon' })).toThrow();
  });
});
