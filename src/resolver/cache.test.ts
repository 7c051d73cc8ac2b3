/**
 * Unit tests for the resolution cache.
 */

import { describe, it, expect } from 'vitest';
import { GLOBAL_SCOPE, ResolutionCache } from './cache.js';

describe('ResolutionCache', () => {
  it('looks names up case-insensitively', () => {
    const cache = new ResolutionCache();
    cache.set('channel', GLOBAL_SCOPE, 'General', '200000000000000001');

    expect(cache.get('channel', GLOBAL_SCOPE, 'general')).toBe('200000000000000001');
    expect(cache.get('channel', GLOBAL_SCOPE, 'GENERAL')).toBe('200000000000000001');
  });

  it('keeps kinds and scopes apart', () => {
    const cache = new ResolutionCache();
    cache.set('channel', GLOBAL_SCOPE, 'general', '200000000000000001');
    cache.set('channel', '100000000000000002', 'general', '200000000000000002');

    expect(cache.get('channel', '100000000000000002', 'general')).toBe('200000000000000002');
    expect(cache.get('channel', GLOBAL_SCOPE, 'general')).toBe('200000000000000001');
    expect(cache.get('user', GLOBAL_SCOPE, 'general')).toBeUndefined();
  });

  it('overwrites an entry for the same key', () => {
    const cache = new ResolutionCache();
    cache.set('user', GLOBAL_SCOPE, 'alice', '111111111111111111');
    cache.set('user', GLOBAL_SCOPE, 'alice', '444444444444444444');

    expect(cache.get('user', GLOBAL_SCOPE, 'alice')).toBe('444444444444444444');
  });

  it('deletes a single entry', () => {
    const cache = new ResolutionCache();
    cache.set('server', GLOBAL_SCOPE, 'ServerA', '100000000000000001');
    cache.set('server', GLOBAL_SCOPE, 'ServerB', '100000000000000002');

    cache.delete('server', GLOBAL_SCOPE, 'servera');
    expect(cache.get('server', GLOBAL_SCOPE, 'ServerA')).toBeUndefined();
    expect(cache.get('server', GLOBAL_SCOPE, 'ServerB')).toBe('100000000000000002');
  });

  it('ignores deletes of unknown keys', () => {
    const cache = new ResolutionCache();
    cache.delete('user', '100000000000000001', 'alice');
    expect(cache.get('user', '100000000000000001', 'alice')).toBeUndefined();
  });
});
