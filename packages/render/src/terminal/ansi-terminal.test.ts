import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it } from 'vitest';
import { BOLD, PLAIN } from '../theme.js';
import { AnsiTerminal } from './ansi-terminal.js';
import { TerminalInitError } from './terminal.js';

class FakeInput extends EventEmitter {
  isTTY = true;
  rawMode = false;
  failRawMode = false;

  setRawMode(mode: boolean): this {
    if (this.failRawMode) {
      throw new Error('EIO');
    }
    this.rawMode = mode;
    return this;
  }

  resume(): this {
    return this;
  }

  pause(): this {
    return this;
  }
}

class FakeOutput extends EventEmitter {
  columns = 10;
  rows = 3;
  written: string[] = [];

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }

  last(): string | undefined {
    return this.written[this.written.length - 1];
  }
}

describe('AnsiTerminal', () => {
  let input: FakeInput;
  let output: FakeOutput;
  let term: AnsiTerminal;

  beforeEach(() => {
    input = new FakeInput();
    output = new FakeOutput();
    term = new AnsiTerminal(input, output);
  });

  describe('init', () => {
    it('refuses a non-terminal input', () => {
      input.isTTY = false;

      expect(() => term.init()).toThrow(TerminalInitError);
      expect(output.written).toEqual([]);
    });

    it('reports a failed switch to raw mode', () => {
      input.failRawMode = true;

      expect(() => term.init()).toThrow('cannot switch terminal to raw mode');
    });

    it('enters raw mode and the alternate screen', () => {
      term.init();

      expect(input.rawMode).toBe(true);
      expect(output.written).toEqual(['\x1b[?1049h\x1b[?25l\x1b[?7l\x1b[2J']);
    });

    it('restores the terminal on close', () => {
      term.init();
      term.close();

      expect(input.rawMode).toBe(false);
      expect(output.last()).toBe('\x1b[?1049l\x1b[?25h\x1b[?7h\x1b[0m');
      expect(input.listenerCount('data')).toBe(0);
      expect(output.listenerCount('resize')).toBe(0);
    });

    it('can be taken again after close', () => {
      term.init();
      term.close();
      term.init();

      expect(input.rawMode).toBe(true);
      expect(input.listenerCount('data')).toBe(1);
    });
  });

  describe('poll', () => {
    beforeEach(() => {
      term.init();
    });

    it('returns queued key events', async () => {
      input.emit('data', Buffer.from('jk'));

      await expect(term.poll()).resolves.toMatchObject({ type: 'key', char: 'j' });
      await expect(term.poll()).resolves.toMatchObject({ type: 'key', char: 'k' });
    });

    it('waits for input that has not arrived', async () => {
      const next = term.poll();
      input.emit('data', Buffer.from('\x1b[A'));

      await expect(next).resolves.toMatchObject({ type: 'key', key: 'ArrowUp' });
    });

    it('reports resizes with the new size', async () => {
      output.columns = 20;
      output.emit('resize');

      await expect(term.poll()).resolves.toMatchObject({ type: 'resize', size: { cols: 20, rows: 3 } });
      expect(term.size()).toEqual({ cols: 20, rows: 3 });
    });
  });

  describe('flush', () => {
    beforeEach(() => {
      term.init();
      term.flush();
    });

    it('repaints the whole screen first', () => {
      expect(output.last()?.startsWith('\x1b[2J\x1b[1;1H\x1b[0m\x1b[39m\x1b[49m')).toBe(true);
    });

    it('writes only the cells that changed', () => {
      term.setCell(2, 1, 'x', PLAIN);
      term.flush();

      expect(output.last()).toBe('\x1b[2;3H\x1b[0m\x1b[39m\x1b[49mx\x1b[0m\x1b[?25l');
    });

    it('writes adjacent changes without moving the cursor again', () => {
      term.setCell(0, 0, 'a', PLAIN);
      term.setCell(1, 0, 'b', BOLD);
      term.flush();

      expect(output.last()).toBe(
        '\x1b[1;1H\x1b[0m\x1b[39m\x1b[49ma\x1b[0m\x1b[39m\x1b[49m\x1b[1mb\x1b[0m\x1b[?25l'
      );
    });

    it('writes nothing but the cursor state when nothing changed', () => {
      term.setCursor(4, 2);
      term.flush();

      expect(output.last()).toBe('\x1b[0m\x1b[3;5H\x1b[?25h');
    });

    it('repaints everything on sync', () => {
      term.setCell(2, 1, 'x', PLAIN);
      term.flush();
      term.sync();

      const frame = output.last() ?? '';
      expect(frame.startsWith('\x1b[2J')).toBe(true);
      expect(frame).toContain('\x1b[2;1H\x1b[0m\x1b[39m\x1b[49m  x       ');
    });
  });
});
