import type { StructuredLogger } from '../../logging/StructuredLogger';
import { type CommandRunner, runCommand } from '../process/runCommand';

interface CommandLine {
  command: string;
  args: string[];
}

interface PlatformCommands {
  copy: CommandLine;
  paste: CommandLine;
  enter: CommandLine;
}

export interface TextInjectorOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  pasteDelayMs: number;
  retryCount: number;
  retryDelayMs: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const COMMAND_TIMEOUT_MS = 4000;

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

const sendKeys = (keys: string): CommandLine => ({
  command: 'powershell',
  args: [
    '-NoProfile',
    '-NonInteractive',
    '-Command',
    `(New-Object -ComObject WScript.Shell).SendKeys('${keys}')`
  ]
});

export const platformCommands = (platform: NodeJS.Platform, env: NodeJS.ProcessEnv): PlatformCommands => {
  if (platform === 'darwin') {
    return {
      copy: { command: 'pbcopy', args: [] },
      paste: {
        command: 'osascript',
        args: ['-e', 'tell application "System Events" to keystroke "v" using command down']
      },
      enter: {
        command: 'osascript',
        args: ['-e', 'tell application "System Events" to key code 36']
      }
    };
  }

  if (platform === 'win32') {
    return {
      copy: { command: 'clip', args: [] },
      paste: sendKeys('^v'),
      enter: sendKeys('{ENTER}')
    };
  }

  return {
    copy: env.WAYLAND_DISPLAY
      ? { command: 'wl-copy', args: [] }
      : { command: 'xclip', args: ['-selection', 'clipboard'] },
    paste: { command: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] },
    enter: { command: 'xdotool', args: ['key', '--clearmodifiers', 'Return'] }
  };
};

/**
 * Types text into the focused window by way of the clipboard and the
 * platform's paste chord.
 */
export class TextInjector {
  private readonly commands: PlatformCommands;
  private readonly pasteDelayMs: number;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: TextInjectorOptions) {
    this.commands = platformCommands(options.platform ?? process.platform, options.env ?? process.env);
    this.pasteDelayMs = options.pasteDelayMs;
    this.retryCount = Math.max(1, options.retryCount);
    this.retryDelayMs = options.retryDelayMs;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async inject(text: string): Promise<void> {
    if (text.length === 0) {
      return;
    }

    const failures: string[] = [];

    for (let attempt = 1; attempt <= this.retryCount; attempt += 1) {
      try {
        await this.injectViaClipboardPaste(text);
        this.logger?.info('Text injection succeeded via clipboard paste', {
          attempt,
          length: text.length
        });
        return;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        failures.push(`attempt ${attempt}: ${detail}`);
        this.logger?.warn('Clipboard text injection failed', { attempt, detail });
      }

      if (attempt < this.retryCount) {
        await sleep(this.retryDelayMs);
      }
    }

    throw new Error(`Text injection failed after ${this.retryCount} attempts. ${failures.slice(-3).join(' | ')}`);
  }

  public async pressEnter(): Promise<void> {
    const { command, args } = this.commands.enter;
    await this.commandRunner(command, args, { timeoutMs: COMMAND_TIMEOUT_MS });
  }

  private async injectViaClipboardPaste(text: string): Promise<void> {
    const { copy, paste } = this.commands;
    await this.commandRunner(copy.command, copy.args, { stdin: text, timeoutMs: COMMAND_TIMEOUT_MS });

    await sleep(this.pasteDelayMs);

    await this.commandRunner(paste.command, paste.args, { timeoutMs: COMMAND_TIMEOUT_MS });
  }
}
