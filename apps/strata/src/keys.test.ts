import { describe, expect, it } from 'vitest';
import { ConfigError } from './config.js';
import { buildKeyMap, DEFAULT_KEYS } from './keys.js';

describe('buildKeyMap', () => {
  it('binds every default sequence', () => {
    const keys = buildKeyMap();

    expect(keys.size).toBe(Object.keys(DEFAULT_KEYS).length);
    expect(keys.get('gg')?.describe()).toBe('top');
    expect(keys.get('gh')?.args).toEqual(['~']);
    expect(keys.get('<cr>')?.name).toBe('open');
  });

  it('applies overrides and removals', () => {
    const keys = buildKeyMap({ x: 'cd /tmp', j: '' });

    expect(keys.get('x')?.describe()).toBe('cd /tmp');
    expect(keys.has('j')).toBe(false);
    expect(keys.get('k')?.name).toBe('up');
  });

  it('rejects unknown commands', () => {
    expect(() => buildKeyMap({ z: 'fly' })).toThrow(ConfigError);
    expect(() => buildKeyMap({ z: 'fly' })).toThrow('keys.z: unknown command "fly"');
  });
});
