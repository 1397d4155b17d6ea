import type { Describable } from '@strata/render';

export const COMMAND_NAMES = [
  'up',
  'down',
  'top',
  'bottom',
  'updir',
  'open',
  'cd',
  'toggle',
  'echo-info',
  'read',
  'shell',
  'redraw',
  'quit',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name);
}

/**
 * A command name with its arguments, as bound to keys or typed at `:`
 */
export class Command implements Describable {
  constructor(
    public readonly name: CommandName,
    public readonly args: readonly string[] = []
  ) {}

  describe(): string {
    return [this.name, ...this.args].join(' ');
  }
}

/**
 * No-op returned for escape, resize and unresolved keys; redraws the screen
 */
export const REDRAW = new Command('redraw');

/**
 * `cd /tmp` -> Command('cd', ['/tmp']); null for blank or unknown commands
 */
export function parseCommand(line: string): Command | null {
  const [name, ...args] = line.trim().split(/\s+/);
  if (name === undefined || !isCommandName(name)) {
    return null;
  }
  return new Command(name, args);
}
