import { describe, expect, it } from 'vitest';
import { MemoryTerminal } from '../testing/memory-terminal.js';
import { Window } from '../window/window.js';
import type { LineSource } from './line-scanner.js';
import { isBinaryRune, PreviewError, previewFile } from './previewer.js';

class ArraySource implements LineSource {
  reads = 0;
  rewinds = 0;
  private next = 0;

  constructor(private readonly lines: string[]) {}

  readLine(): string | null {
    const line = this.lines[this.next];
    if (line === undefined) {
      return null;
    }
    this.next++;
    this.reads++;
    return line;
  }

  rewind(): void {
    this.next = 0;
    this.rewinds++;
  }
}

class FailingSource implements LineSource {
  readLine(): string | null {
    throw new Error('line too long');
  }

  rewind(): void {}
}

function setup(height = 5) {
  const term = new MemoryTerminal(20, 6);
  const win = new Window(term, 20, height, 0, 0, 8);
  return { term, win };
}

describe('isBinaryRune', () => {
  it('accepts printable text and whitespace', () => {
    for (const char of ['a', '\u00e9', '\u6f22', ' ', '\t', '\u00a0', '\ufffd']) {
      expect(isBinaryRune(char)).toBe(false);
    }
  });

  it('rejects control and format characters', () => {
    for (const char of ['\u0000', '\u0007', '\u001b', '\u200b']) {
      expect(isBinaryRune(char)).toBe(true);
    }
  });
});

describe('previewFile', () => {
  it('shows the first lines indented', () => {
    const { term, win } = setup();
    previewFile(win, new ArraySource(['hello', 'a\tb']));
    term.flush();

    expect(term.rowText(0).slice(0, 8)).toBe('  hello ');
    expect(term.rowText(1).slice(0, 12)).toBe('  a       b ');
  });

  it('reads no more lines than the window holds', () => {
    const { term, win } = setup(3);
    const source = new ArraySource(['1', '2', '3', '4', '5']);
    previewFile(win, source);
    term.flush();

    expect(source.reads).toBe(6);
    expect(term.rowText(2).slice(0, 3)).toBe('  3');
    expect(term.rowText(3).slice(0, 3)).toBe('   ');
  });

  it('stops at the first non-printable character', () => {
    const { term, win } = setup();
    const source = new ArraySource(['fine', 'a\u0000b', 'never read']);
    previewFile(win, source);
    term.flush();

    expect(source.reads).toBe(2);
    expect(source.rewinds).toBe(0);
    expect(term.rowText(0).slice(0, 7)).toBe('binary ');
    expect(term.cellAt(0, 0)?.attrs.bold).toBe(true);
    expect(term.rowText(1).slice(0, 4)).toBe('    ');
  });

  it('draws nothing for an empty file', () => {
    const { term, win } = setup();
    previewFile(win, new ArraySource([]));
    term.flush();

    expect(term.rowText(0)).toBe(' '.repeat(20));
  });

  it('wraps read failures', () => {
    const { win } = setup();

    expect(() => previewFile(win, new FailingSource())).toThrow(PreviewError);
    expect(() => previewFile(win, new FailingSource())).toThrow('printing regular file: line too long');
  });
});
