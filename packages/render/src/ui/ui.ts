import * as fs from 'fs';
import * as path from 'path';
import type { Rect } from '@strata/protocol';
import { formatCtime, formatMode, humanize } from '../format/formatters.js';
import { KeyResolver, type Candidate, type Describable } from '../input/key-resolver.js';
import { LayoutManager } from '../layout/layout-manager.js';
import { DirectoryRenderer } from '../panes/directory-renderer.js';
import { LineScanner } from '../panes/line-scanner.js';
import { previewFile } from '../panes/previewer.js';
import type { Logger, TerminalBackend } from '../terminal/terminal.js';
import { BOLD, PATH_STYLE, PLAIN, USER_HOST_STYLE } from '../theme.js';
import { Window } from '../window/window.js';
import { formatMenuRows } from './bind-menu.js';
import type { Navigation } from './navigation.js';
import { runPrompt, type Completers } from './prompt.js';

/**
 * Settings the engine is built with. Constructed once by the caller.
 */
export interface EngineOptions<C> {
  ratios: readonly number[];
  tabstop: number;
  showinfo: string;
  preview: boolean;
  keys: ReadonlyMap<string, C>;
}

/**
 * Who and where, for the path bar
 */
export interface Identity {
  user: string;
  host: string;
  /** Home directory, shown as `~` */
  home: string;
}

export interface UIOptions<C> {
  backend: TerminalBackend;
  options: EngineOptions<C>;
  identity: Identity;
  /** Command returned for escape, resize and unresolved input */
  noop: C;
  log?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns every window on screen and draws whole frames
 */
export class UI<C extends Describable> {
  /** Transient status line text */
  message = '';

  private readonly backend: TerminalBackend;
  private readonly options: EngineOptions<C>;
  private readonly identity: Identity;
  private readonly log: Logger;
  private readonly layoutManager: LayoutManager;
  private readonly dirRenderer: DirectoryRenderer;
  private readonly resolver: KeyResolver<C>;

  private readonly panes: Window[];
  private readonly pathBar: Window;
  private readonly statusLine: Window;
  private readonly menu: Window;

  constructor(config: UIOptions<C>) {
    this.backend = config.backend;
    this.options = config.options;
    this.identity = config.identity;
    this.log = config.log ?? console;
    this.layoutManager = new LayoutManager(this.options.ratios);
    this.resolver = new KeyResolver(this.options.keys, config.noop);
    this.dirRenderer = new DirectoryRenderer({
      showinfo: this.options.showinfo,
      log: this.log,
      onWarning: (message) => {
        this.message = message;
      },
    });

    const { cols, rows } = this.backend.size();
    const layout = this.layoutManager.calculateLayout(cols, rows);

    this.panes = layout.panes.map((rect) => this.createWindow(rect));
    this.pathBar = this.createWindow(layout.pathBar);
    this.statusLine = this.createWindow(layout.statusLine);
    this.menu = this.createWindow(layout.menu);
  }

  private createWindow(rect: Rect): Window {
    return new Window(this.backend, rect.width, rect.height, rect.x, rect.y, this.options.tabstop);
  }

  /**
   * Rows available to each directory pane
   */
  get paneHeight(): number {
    return this.panes[0]?.height ?? 0;
  }

  /**
   * Re-query the terminal size and lay every window out again
   */
  renew(): void {
    this.backend.flush();

    const { cols, rows } = this.backend.size();
    const layout = this.layoutManager.calculateLayout(cols, rows);

    layout.panes.forEach((rect, i) => {
      this.panes[i]?.renew(rect.width, rect.height, rect.x, rect.y);
    });

    for (const [win, rect] of [
      [this.pathBar, layout.pathBar],
      [this.statusLine, layout.statusLine],
      [this.menu, layout.menu],
    ] as const) {
      win.renew(rect.width, rect.height, rect.x, rect.y);
    }
  }

  /**
   * Draw one complete frame and flush it
   */
  draw(nav: Navigation): void {
    this.backend.clear();

    const dir = nav.currentDir();
    if (dir) {
      this.drawPathBar(dir.path);
    }

    const available = this.options.preview ? this.panes.length - 1 : this.panes.length;
    const length = Math.max(0, Math.min(available, nav.dirs.length));
    const paneOffset = available - length;
    const dirOffset = nav.dirs.length - length;

    for (let i = 0; i < length; i++) {
      const win = this.panes[paneOffset + i];
      const snapshot = nav.dirs[dirOffset + i];
      if (win && snapshot) {
        this.dirRenderer.render(win, snapshot, nav.marks);
      }
    }

    if (this.options.preview && dir && dir.entries.length > 0) {
      this.drawPreview(nav);
    }

    this.statusLine.print(0, 0, PLAIN, this.message);
    this.backend.flush();
  }

  private drawPathBar(dirPath: string): void {
    const { user, host, home } = this.identity;

    const shown =
      home !== '' && (dirPath === home || dirPath.startsWith(home + path.sep))
        ? '~' + dirPath.slice(home.length)
        : dirPath;

    let x = this.pathBar.print(0, 0, USER_HOST_STYLE, `${user}@${host}`);
    x = this.pathBar.print(x, 0, PLAIN, ':');
    this.pathBar.print(x, 0, PATH_STYLE, shown);
  }

  private drawPreview(nav: Navigation): void {
    const win = this.panes[this.panes.length - 1];
    const target = nav.currentPath();
    if (!win || target === null) {
      return;
    }

    let stats: fs.Stats;
    try {
      stats = fs.statSync(target);
    } catch (error) {
      this.report(`getting file information: ${errorMessage(error)}`);
      return;
    }

    if (stats.isDirectory()) {
      try {
        const snapshot = nav.loadDirectory(target, nav.cachedScroll(target));
        this.dirRenderer.render(win, snapshot, nav.marks);
      } catch (error) {
        this.report(`loading directory: ${errorMessage(error)}`);
      }
    } else if (stats.isFile()) {
      this.previewRegularFile(win, target);
    }
  }

  private previewRegularFile(win: Window, target: string): void {
    let fd: number;
    try {
      fd = fs.openSync(target, 'r');
    } catch (error) {
      this.report(`opening file: ${errorMessage(error)}`);
      return;
    }

    try {
      previewFile(win, new LineScanner(fd));
    } catch (error) {
      this.report(errorMessage(error));
    } finally {
      fs.closeSync(fd);
    }
  }

  private report(message: string): void {
    this.message = message;
    this.log.error(`[Preview] ${message}`);
  }

  /**
   * Put mode, size and modification time of the selection on the status line
   */
  echoFileInfo(nav: Navigation): void {
    const dir = nav.currentDir();
    const entry = dir?.entries[dir.index];
    if (!entry) {
      return;
    }

    this.message = `${formatMode(entry.mode)} ${humanize(entry.size)} ${formatCtime(entry.mtime)}`;
  }

  /**
   * Drop the status message and blank the status line
   */
  clearMessage(): void {
    this.message = '';
    this.statusLine.printLine(0, 0, PLAIN, '');
    this.backend.setCursor(this.statusLine.x, this.statusLine.y);
    this.backend.flush();
  }

  /**
   * Wait for input until it resolves to a command. Partial sequences show
   * the matching bindings in the menu.
   */
  async readCommand(): Promise<C> {
    for (;;) {
      const event = await this.backend.poll();
      const result = this.resolver.feed(event);

      switch (result.kind) {
        case 'ignored':
          break;
        case 'pending':
          this.listBinds(result.candidates);
          break;
        case 'dispatch':
          return result.command;
        case 'reset':
          if (result.message !== undefined) {
            this.message = result.message;
          }
          return result.command;
      }
    }
  }

  /**
   * Read a line on the status line
   */
  prompt(prefix: string, completers: Completers): Promise<string> {
    return runPrompt(this.backend, this.statusLine, prefix, completers);
  }

  /**
   * Show the candidate bindings above the status line
   */
  listBinds(candidates: readonly Candidate<C>[]): void {
    const lines = formatMenuRows(
      [['keys', 'command'], ...candidates.map((c) => [c.keys, c.command.describe()])],
      this.options.tabstop
    );

    const bottom = this.statusLine.y;
    this.menu.renew(this.statusLine.width, lines.length, 0, bottom - lines.length);

    lines.forEach((line, i) => {
      this.menu.printLine(0, i, i === 0 ? BOLD : PLAIN, line);
    });

    this.backend.flush();
  }

  /**
   * Hand the terminal back, e.g. before running a shell command
   */
  pause(): void {
    this.backend.close();
  }

  /**
   * Take the terminal again; failure here is fatal
   */
  resume(): void {
    this.backend.init();
  }

  /**
   * Repaint everything after something else drew on the terminal
   */
  sync(): void {
    try {
      this.backend.sync();
    } catch (error) {
      this.log.error(`[Terminal] syncing terminal: ${errorMessage(error)}`);
    }
    this.backend.setCursor(0, 0);
    this.backend.hideCursor();
  }
}
