import { describe, expect, it } from 'vitest';
import { KeyParser } from './key-parser.js';

function parse(...chunks: (string | number[])[]) {
  const parser = new KeyParser();
  return chunks.flatMap((chunk) =>
    parser.parse(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk))
  );
}

describe('KeyParser', () => {
  it('decodes printable characters', () => {
    const [a, upper] = parse('aG');

    expect(a).toMatchObject({ type: 'key', key: 'a', char: 'a', shift: false });
    expect(upper).toMatchObject({ type: 'key', key: 'G', char: 'G', shift: true });
  });

  it('decodes multi-byte characters split across reads', () => {
    const bytes = [...Buffer.from('é', 'utf8')];
    const events = parse(bytes.slice(0, 1), bytes.slice(1));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'key', char: 'é' });
  });

  it('names control keys', () => {
    const events = parse([0x0d, 0x09, 0x08, 0x7f, 0x0c]);

    expect(events.map((e) => e.key)).toEqual(['Enter', 'Tab', 'Backspace', 'Backspace2', 'Ctrl-L']);
    expect(events[4]?.ctrl).toBe(true);
    expect(events[0]?.ctrl).toBe(false);
  });

  it('treats a lone escape byte as the escape key', () => {
    expect(parse([0x1b])[0]).toMatchObject({ type: 'key', key: 'Escape' });
  });

  it('decodes arrow keys in both encodings', () => {
    const events = parse('\x1b[A\x1b[B\x1bOC\x1bOD');

    expect(events.map((e) => e.key)).toEqual(['ArrowUp', 'ArrowDown', 'ArrowRight', 'ArrowLeft']);
  });

  it('reads modifiers from CSI parameters', () => {
    expect(parse('\x1b[1;5A')[0]).toMatchObject({ key: 'ArrowUp', ctrl: true, shift: false });
    expect(parse('\x1b[1;2D')[0]).toMatchObject({ key: 'ArrowLeft', shift: true, ctrl: false });
  });

  it('waits for the rest of an incomplete CSI sequence', () => {
    const parser = new KeyParser();

    expect(parser.parse(Buffer.from('\x1b[1;'))).toEqual([]);
    expect(parser.parse(Buffer.from('5B'))[0]).toMatchObject({ key: 'ArrowDown', ctrl: true });
  });

  it('marks alt combinations', () => {
    expect(parse('\x1bx')[0]).toMatchObject({ key: 'x', char: 'x', alt: true });
  });

  it('reports unrecognized sequences as unknown', () => {
    expect(parse('\x1b[99z')[0]).toMatchObject({ type: 'unknown' });
  });

  it('decodes editing keys', () => {
    expect(parse('\x1b[3~\x1b[H').map((e) => e.key)).toEqual(['Delete', 'Home']);
  });
});
