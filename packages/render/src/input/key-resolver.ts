import type { KeyEvent } from '@strata/protocol';
import { toKeyToken } from './key-token.js';

/**
 * Anything that can be listed in the bindings menu
 */
export interface Describable {
  describe(): string;
}

export type ResolverState =
  | { kind: 'idle' }
  | { kind: 'accumulating'; pending: readonly string[] };

export interface Candidate<C> {
  keys: string;
  command: C;
}

export type ResetReason = 'escape' | 'resize' | 'unhandled' | 'unknown';

export type Resolution<C> =
  | { kind: 'dispatch'; command: C }
  | { kind: 'reset'; reason: ResetReason; command: C; message?: string }
  | { kind: 'pending'; candidates: Candidate<C>[] }
  | { kind: 'ignored' };

const IDLE: ResolverState = { kind: 'idle' };

/**
 * Bindings whose key starts with `prefix`, sorted by key, and the command
 * bound to exactly `prefix` if any
 */
export function findBindings<C>(
  keys: ReadonlyMap<string, C>,
  prefix: string
): { candidates: Candidate<C>[]; exact: C | undefined } {
  const candidates: Candidate<C>[] = [];
  let exact: C | undefined;

  for (const [key, command] of keys) {
    if (key.startsWith(prefix)) {
      candidates.push({ keys: key, command });
      if (key === prefix) {
        exact = command;
      }
    }
  }

  candidates.sort((a, b) => (a.keys < b.keys ? -1 : a.keys > b.keys ? 1 : 0));
  return { candidates, exact };
}

/**
 * Turns key events into commands by matching the typed sequence against the
 * bindings. An exact match dispatches at once, even when longer bindings
 * share its prefix.
 */
export class KeyResolver<C> {
  private state: ResolverState = IDLE;

  constructor(
    private readonly keys: ReadonlyMap<string, C>,
    private readonly noop: C
  ) {}

  getState(): ResolverState {
    return this.state;
  }

  reset(): void {
    this.state = IDLE;
  }

  feed(event: KeyEvent): Resolution<C> {
    const token = toKeyToken(event);

    switch (token.kind) {
      case 'ignored':
        return { kind: 'ignored' };
      case 'resize':
      case 'escape':
        return this.resetWith(token.kind);
      case 'unhandled':
        return this.resetWith('unhandled', 'unhandled key');
      case 'token':
        return this.advance(token.token);
    }
  }

  private advance(token: string): Resolution<C> {
    const pending = this.state.kind === 'accumulating' ? [...this.state.pending, token] : [token];
    const sequence = pending.join('');
    const { candidates, exact } = findBindings(this.keys, sequence);

    if (candidates.length === 0) {
      return this.resetWith('unknown', `unknown mapping: ${sequence}`);
    }

    if (exact !== undefined) {
      this.state = IDLE;
      return { kind: 'dispatch', command: exact };
    }

    this.state = { kind: 'accumulating', pending };
    return { kind: 'pending', candidates };
  }

  private resetWith(reason: ResetReason, message?: string): Resolution<C> {
    this.state = IDLE;
    return message === undefined
      ? { kind: 'reset', reason, command: this.noop }
      : { kind: 'reset', reason, command: this.noop, message };
  }
}
