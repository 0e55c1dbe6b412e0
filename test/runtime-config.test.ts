import { describe, it, expect } from 'vitest';
import { getRuntimeConfig, readFlag } from '../src/config/runtime.config.js';

describe('runtime config', () => {
  it('defaults every flag to off', () => {
    expect(getRuntimeConfig({})).toEqual({ debug: false, allowRoot: false });
  });

  it('reads truthy spellings case-insensitively', () => {
    expect(getRuntimeConfig({ PARSER_DEBUG: 'YES', PARSER_ALLOW_ROOT: '1' })).toEqual({
      debug: true,
      allowRoot: true,
    });
    expect(readFlag({ X: ' on ' }, 'X')).toBe(true);
    expect(readFlag({ X: 'off' }, 'X', true)).toBe(false);
    expect(readFlag({ X: '' }, 'X', true)).toBe(true);
  });
});
