import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { KeyEvent } from '@strata/protocol';
import { UI } from '@strata/render';
import { charKey, MemoryTerminal, namedKey, typeText } from '@strata/render/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { App } from './app.js';
import { REDRAW, type Command } from './commands.js';
import { createCompleters } from './complete.js';
import { buildKeyMap } from './keys.js';
import { Nav } from './nav/nav.js';

vi.mock('child_process', () => ({ spawnSync: vi.fn() }));

let root: string;

beforeEach(() => {
  root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'app-')));
  fs.mkdirSync(path.join(root, 'alpha'));
  fs.mkdirSync(path.join(root, 'beta'));
  fs.writeFileSync(path.join(root, 'a.txt'), 'first\n');
  fs.writeFileSync(path.join(root, 'b.txt'), 'second\n');
  vi.mocked(spawnSync).mockReset();
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function setup(events: KeyEvent[]) {
  const term = new MemoryTerminal(60, 12, [...events, charKey('q')]);
  term.init();
  const log = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const ui = new UI<Command>({
    backend: term,
    options: { ratios: [1, 2, 3], tabstop: 8, showinfo: 'none', preview: true, keys: buildKeyMap() },
    identity: { user: 'ana', host: 'box', home: '/home/ana' },
    noop: REDRAW,
    log,
  });
  const nav = new Nav(root, ui.paneHeight, false);
  const app = new App(ui, nav, createCompleters(() => nav.currentDir()?.path ?? root), log);
  return { term, ui, nav, app, log };
}

function spawnResult(status: number | null, error?: Error) {
  return {
    pid: 1,
    output: [],
    stdout: Buffer.alloc(0),
    stderr: Buffer.alloc(0),
    status,
    signal: null,
    ...(error && { error }),
  };
}

describe('App', () => {
  it('moves the selection and echoes its details', async () => {
    const { app, nav, ui } = setup([charKey('j')]);
    await app.run();

    expect(nav.currentPath()).toBe(path.join(root, 'beta'));
    expect(ui.message.startsWith('drwx')).toBe(true);
  });

  it('jumps to the bottom and back to the top', async () => {
    const { app, nav } = setup([charKey('G')]);
    await app.run();
    expect(nav.currentPath()).toBe(path.join(root, 'b.txt'));

    const again = setup([charKey('g'), charKey('g')]);
    await again.app.run();
    expect(again.nav.currentPath()).toBe(path.join(root, 'alpha'));
  });

  it('enters and leaves directories', async () => {
    const { app, nav } = setup([charKey('l')]);
    await app.run();
    expect(nav.currentDir()?.path).toBe(path.join(root, 'alpha'));

    const back = setup([namedKey('Enter'), charKey('h')]);
    await back.app.run();
    expect(back.nav.currentDir()?.path).toBe(root);
  });

  it('stays put when opening a file', async () => {
    const { app, nav, ui } = setup([charKey('j'), charKey('j'), charKey('l')]);
    await app.run();

    expect(nav.currentDir()?.path).toBe(root);
    expect(ui.message.startsWith('-rw')).toBe(true);
  });

  it('marks the selection', async () => {
    const { app, nav } = setup([charKey(' ')]);
    await app.run();

    expect([...nav.marks]).toEqual([path.join(root, 'alpha')]);
  });

  it('runs commands typed at the prompt', async () => {
    const { app, nav } = setup([charKey(':'), ...typeText(`cd ${root}/beta`), namedKey('Enter')]);
    await app.run();

    expect(nav.currentDir()?.path).toBe(path.join(root, 'beta'));
  });

  it('resolves relative cd targets against the browsed directory', async () => {
    const { app, nav } = setup([charKey(':'), ...typeText('cd alpha'), namedKey('Enter')]);
    await app.run();

    expect(nav.currentDir()?.path).toBe(path.join(root, 'alpha'));
  });

  it('follows relative cd targets after moving around', async () => {
    const { app, nav } = setup([
      charKey('l'),
      charKey(':'),
      ...typeText('cd ../beta'),
      namedKey('Enter'),
    ]);
    await app.run();

    expect(nav.currentDir()?.path).toBe(path.join(root, 'beta'));
  });

  it('reports unknown commands', async () => {
    const { app, ui } = setup([charKey(':'), ...typeText('fly'), namedKey('Enter')]);
    await app.run();

    expect(ui.message).toBe('unknown command: fly');
  });

  it('does nothing for an abandoned prompt', async () => {
    const { app, nav, ui } = setup([charKey(':'), ...typeText('cd /'), namedKey('Escape')]);
    await app.run();

    expect(nav.currentDir()?.path).toBe(root);
    expect(ui.message).toBe('');
  });

  it('reports a failed cd', async () => {
    const file = path.join(root, 'a.txt');
    const { app, ui, log } = setup([charKey(':'), ...typeText(`cd ${file}`), namedKey('Enter')]);
    await app.run();

    expect(ui.message).toBe(`changing directory: not a directory: ${file}`);
    expect(log.error).toHaveBeenCalledWith(`[Command] changing directory: not a directory: ${file}`);
  });

  it('reports unknown key sequences and redraws', async () => {
    const { app, ui, term } = setup([charKey('x')]);
    await app.run();

    expect(ui.message).toBe('unknown mapping: x');
    expect(term.syncCount).toBe(1);
    expect(term.rowText(11).trimEnd()).toBe('unknown mapping: x');
  });

  it('redraws on ctrl-l', async () => {
    const { app, term } = setup([namedKey('Ctrl-L', { ctrl: true })]);
    await app.run();

    expect(term.syncCount).toBe(1);
  });

  describe('shell', () => {
    it('runs the line in the current directory with the terminal released', async () => {
      const { app, term } = setup([charKey('$'), ...typeText('make'), namedKey('Enter')]);
      const activeDuringRun: boolean[] = [];
      vi.mocked(spawnSync).mockImplementation(() => {
        activeDuringRun.push(term.active);
        return spawnResult(0);
      });

      await app.run();

      expect(spawnSync).toHaveBeenCalledWith('sh', ['-c', 'make'], { stdio: 'inherit', cwd: root });
      expect(activeDuringRun).toEqual([false]);
      expect(term.active).toBe(true);
      expect(term.syncCount).toBe(1);
    });

    it('reports a non-zero exit status', async () => {
      const { app, ui } = setup([charKey('!'), ...typeText('false'), namedKey('Enter')]);
      vi.mocked(spawnSync).mockReturnValue(spawnResult(3));

      await app.run();

      expect(ui.message).toBe('shell command exited with status 3');
    });

    it('reports a shell that could not start', async () => {
      const { app, ui } = setup([charKey('$'), ...typeText('ls'), namedKey('Enter')]);
      vi.mocked(spawnSync).mockReturnValue(spawnResult(null, new Error('spawn sh ENOENT')));

      await app.run();

      expect(ui.message).toBe('running shell: spawn sh ENOENT');
    });

    it('keeps running when completing inside a removed directory', async () => {
      const { app, nav, ui } = setup([charKey('$'), ...typeText('cat a'), namedKey('Tab'), namedKey('Escape')]);
      const gone = path.join(root, 'alpha');
      nav.open();
      fs.rmSync(gone, { recursive: true, force: true });

      await expect(app.run()).resolves.toBeUndefined();
      expect(nav.currentDir()?.path).toBe(gone);
      expect(spawnSync).not.toHaveBeenCalled();
      expect(ui.message).toBe('');
    });

    it('skips an empty line', async () => {
      const { app } = setup([charKey('$'), namedKey('Enter')]);
      await app.run();

      expect(spawnSync).not.toHaveBeenCalled();
    });
  });
});
