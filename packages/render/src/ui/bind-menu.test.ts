import { describe, expect, it } from 'vitest';
import { formatMenuRows } from './bind-menu.js';

describe('formatMenuRows', () => {
  it('aligns columns on the tab stop past the widest cell', () => {
    const rows = [
      ['keys', 'command'],
      ['gg', 'top'],
      ['gh', 'cd ~'],
    ];

    expect(formatMenuRows(rows, 8)).toEqual(['keys    command', 'gg      top', 'gh      cd ~']);
  });

  it('moves to the following stop when the widest cell fills one', () => {
    expect(formatMenuRows([['abcdefgh', 'x']], 8)).toEqual(['abcdefgh        x']);
  });

  it('handles several padded columns', () => {
    const rows = [
      ['a', 'bb', 'c'],
      ['aaaaa', 'b', 'cc'],
    ];

    expect(formatMenuRows(rows, 4)).toEqual(['a       bb  c', 'aaaaa   b   cc']);
  });

  it('returns nothing for no rows', () => {
    expect(formatMenuRows([], 8)).toEqual([]);
  });
});
