import { describe, expect, it } from 'vitest';
import { parseConfig } from './config.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({
      MCP_PORT: 3000,
      MCP_HOST: '127.0.0.1',
      ACTIVITY_LOG_PATH: 'data/activity_log.csv',
      ACTIVITY_LOG_CREATE: false,
      LOG_LEVEL: 'info'
    });
  });

  it('reads overrides', () => {
    const config = parseConfig({
      MCP_PORT: '8080',
      ACTIVITY_LOG_CREATE: '1',
      ACTIVITY_CATEGORIES: ' Reading , Writing ,, ',
      LOG_LEVEL: 'DEBUG'
    });
    expect(config.MCP_PORT).toBe(8080);
    expect(config.ACTIVITY_LOG_CREATE).toBe(true);
    expect(config.ACTIVITY_CATEGORIES).toEqual(['Reading', 'Writing']);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('treats blank values as unset', () => {
    expect(parseConfig({ MCP_PORT: '', LOG_LEVEL: '  ' }).MCP_PORT).toBe(3000);
  });

  it('names the invalid variable', () => {
    expect(() => parseConfig({ MCP_PORT: 'eighty' })).toThrow(/^Invalid configuration: MCP_PORT: /);
    expect(() => parseConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
