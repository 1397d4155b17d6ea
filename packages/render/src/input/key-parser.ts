import type { KeyEvent } from '@strata/protocol';

/**
 * Parsed key information
 */
export type ParsedKey = KeyEvent;

type ParseResult = { event: ParsedKey; consumed: number };

const NO_MODIFIERS = { ctrl: false, alt: false, shift: false, meta: false } as const;

function key(name: string, mods: Partial<Record<keyof typeof NO_MODIFIERS, boolean>> = {}): ParsedKey {
  return { type: 'key', key: name, ...NO_MODIFIERS, ...mods };
}

const UNKNOWN: ParsedKey = { type: 'unknown', ...NO_MODIFIERS };

/**
 * Parser for terminal input sequences
 */
export class KeyParser {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Parse incoming data and emit key events
   */
  parse(data: Buffer): ParsedKey[] {
    this.buffer = Buffer.concat([this.buffer, data]);
    const events: ParsedKey[] = [];

    while (this.buffer.length > 0) {
      const result = this.parseOne();
      if (result) {
        events.push(result.event);
        this.buffer = this.buffer.subarray(result.consumed);
      } else {
        // Incomplete sequence, wait for more data
        break;
      }
    }

    return events;
  }

  /**
   * Clear buffer
   */
  clear(): void {
    this.buffer = Buffer.alloc(0);
  }

  private parseOne(): ParseResult | null {
    const first = this.buffer[0] ?? 0;

    // ESC sequence
    if (first === 0x1b) {
      return this.parseEscape();
    }

    // Control characters
    if (first < 32) {
      return this.parseControl(first);
    }

    // DEL, sent by most terminals for the backspace key
    if (first === 0x7f) {
      return { event: key('Backspace2'), consumed: 1 };
    }

    // Regular character (including UTF-8)
    return this.parseChar(first);
  }

  private parseEscape(): ParseResult | null {
    const b = this.buffer;

    if (b.length === 1) {
      // A lone ESC byte is treated as the escape key
      return { event: key('Escape'), consumed: 1 };
    }

    // ESC [ (CSI sequence)
    if (b[1] === 0x5b) {
      return this.parseCSI();
    }

    // ESC O (SS3 sequence - function keys)
    if (b[1] === 0x4f) {
      return this.parseSS3();
    }

    // Alt + key
    const second = b[1] ?? 0;
    if (second >= 32 && second < 127) {
      const char = String.fromCharCode(second);
      return {
        event: { ...key(char, { alt: true, shift: char !== char.toLowerCase() }), char },
        consumed: 2,
      };
    }

    // Unknown escape sequence
    return { event: UNKNOWN, consumed: 2 };
  }

  private parseCSI(): ParseResult | null {
    const b = this.buffer;

    // Find end of CSI sequence (final byte in range 0x40-0x7E)
    let end = 2;
    while (end < b.length && ((b[end] ?? 0) < 0x40 || (b[end] ?? 0) > 0x7e)) {
      end++;
    }

    const finalByte = b[end];
    if (finalByte === undefined) return null; // Incomplete

    const params = b.subarray(2, end).toString();

    const arrowMap: Record<number, string> = {
      0x41: 'ArrowUp',
      0x42: 'ArrowDown',
      0x43: 'ArrowRight',
      0x44: 'ArrowLeft',
    };

    const arrow = arrowMap[finalByte];
    if (arrow) {
      return { event: key(arrow, this.parseModifiers(params)), consumed: end + 1 };
    }

    const specialMap: Record<string, string> = {
      '1~': 'Home',
      '2~': 'Insert',
      '3~': 'Delete',
      '4~': 'End',
      '5~': 'PageUp',
      '6~': 'PageDown',
      '7~': 'Home',
      '8~': 'End',
      H: 'Home',
      F: 'End',
    };

    const special = specialMap[params + String.fromCharCode(finalByte)];
    if (special) {
      return { event: key(special), consumed: end + 1 };
    }

    return { event: UNKNOWN, consumed: end + 1 };
  }

  private parseSS3(): ParseResult | null {
    const b = this.buffer;
    const third = b[2];
    if (third === undefined) return null;

    const ss3Keys: Record<number, string> = {
      0x41: 'ArrowUp',
      0x42: 'ArrowDown',
      0x43: 'ArrowRight',
      0x44: 'ArrowLeft',
      0x50: 'F1',
      0x51: 'F2',
      0x52: 'F3',
      0x53: 'F4',
    };

    const name = ss3Keys[third];
    return { event: name ? key(name) : UNKNOWN, consumed: 3 };
  }

  private parseControl(b: number): ParseResult {
    const controlMap: Record<number, string> = {
      0x00: 'Ctrl-Space',
      0x08: 'Backspace',
      0x09: 'Tab',
      0x0a: 'Enter',
      0x0d: 'Enter',
    };

    const name = controlMap[b] ?? `Ctrl-${String.fromCharCode(b + 64)}`;
    const isCtrl = b !== 0x08 && b !== 0x09 && b !== 0x0a && b !== 0x0d;

    return { event: key(name, { ctrl: isCtrl }), consumed: 1 };
  }

  private parseChar(first: number): ParseResult | null {
    const b = this.buffer;
    let charLen = 1;

    // Determine UTF-8 character length
    if ((first & 0xe0) === 0xc0) charLen = 2;
    else if ((first & 0xf0) === 0xe0) charLen = 3;
    else if ((first & 0xf8) === 0xf0) charLen = 4;

    if (b.length < charLen) return null;

    const char = b.subarray(0, charLen).toString('utf8');

    return {
      event: { ...key(char, { shift: char !== char.toLowerCase() }), char },
      consumed: charLen,
    };
  }

  private parseModifiers(params: string): { ctrl: boolean; alt: boolean; shift: boolean; meta: boolean } {
    const modifier = params.split(';')[1];
    if (modifier === undefined) {
      return { ...NO_MODIFIERS };
    }

    const mod = parseInt(modifier, 10) - 1;
    return {
      shift: (mod & 1) !== 0,
      alt: (mod & 2) !== 0,
      ctrl: (mod & 4) !== 0,
      meta: (mod & 8) !== 0,
    };
  }
}
