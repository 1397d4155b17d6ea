import { spawnSync } from 'child_process';
import * as os from 'os';
import * as path from 'path';
import { COMMAND_PREFIX, SHELL_PREFIX, type Completers, type Logger, type UI } from '@strata/render';
import { parseCommand, type Command } from './commands.js';
import type { Nav } from './nav/nav.js';

function expandHome(target: string): string {
  if (target === '~') return os.homedir();
  if (target.startsWith('~/')) return path.join(os.homedir(), target.slice(2));
  return target;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Main loop: draw a frame, read a command, run it
 */
export class App {
  private quitting = false;

  constructor(
    private readonly ui: UI<Command>,
    private readonly nav: Nav,
    private readonly completers: Completers,
    private readonly log: Logger
  ) {}

  async run(): Promise<void> {
    while (!this.quitting) {
      this.ui.draw(this.nav);
      const command = await this.ui.readCommand();
      await this.execute(command);
    }
  }

  async execute(command: Command): Promise<void> {
    switch (command.name) {
      case 'down':
        this.nav.down();
        this.ui.echoFileInfo(this.nav);
        break;
      case 'up':
        this.nav.up();
        this.ui.echoFileInfo(this.nav);
        break;
      case 'top':
        this.nav.top();
        this.ui.echoFileInfo(this.nav);
        break;
      case 'bottom':
        this.nav.bottom();
        this.ui.echoFileInfo(this.nav);
        break;
      case 'updir':
        this.nav.updir();
        this.ui.echoFileInfo(this.nav);
        break;
      case 'open':
        this.guard('opening', () => {
          this.nav.open();
          this.ui.echoFileInfo(this.nav);
        });
        break;
      case 'cd':
        this.guard('changing directory', () => this.nav.cd(this.resolveTarget(command.args[0] ?? '~')));
        break;
      case 'toggle':
        this.nav.toggleMark();
        break;
      case 'echo-info':
        this.ui.echoFileInfo(this.nav);
        break;
      case 'read':
        await this.read();
        break;
      case 'shell':
        await this.shell();
        break;
      case 'redraw':
        this.ui.renew();
        this.nav.renew(this.ui.paneHeight);
        this.ui.sync();
        break;
      case 'quit':
        this.quitting = true;
        break;
    }
  }

  /**
   * Relative targets are taken from the directory being browsed, not the
   * process working directory
   */
  private resolveTarget(target: string): string {
    return path.resolve(this.nav.currentDir()?.path ?? process.cwd(), expandHome(target));
  }

  private guard(action: string, run: () => void): void {
    try {
      run();
    } catch (error) {
      this.ui.message = `${action}: ${errorMessage(error)}`;
      this.log.error(`[Command] ${this.ui.message}`);
    }
  }

  private async read(): Promise<void> {
    const line = await this.ui.prompt(COMMAND_PREFIX, this.completers);
    if (line.trim() === '') {
      return;
    }

    const command = parseCommand(line);
    if (!command) {
      this.ui.message = `unknown command: ${line.trim()}`;
      return;
    }
    await this.execute(command);
  }

  private async shell(): Promise<void> {
    const line = await this.ui.prompt(SHELL_PREFIX, this.completers);
    if (line.trim() === '') {
      return;
    }

    this.log.log(`[Shell] ${line}`);
    this.ui.pause();
    try {
      const result = spawnSync('sh', ['-c', line], {
        stdio: 'inherit',
        cwd: this.nav.currentDir()?.path,
      });
      if (result.error) {
        this.ui.message = `running shell: ${result.error.message}`;
      } else if (result.status !== 0) {
        this.ui.message = `shell command exited with status ${result.status ?? result.signal}`;
      }
    } finally {
      this.ui.resume();
      this.ui.sync();
    }
  }
}
