import {
  GlobalKeyboardListener,
  type IGlobalKey,
  type IGlobalKeyDownMap,
  type IGlobalKeyEvent,
  type IGlobalKeyListener
} from 'node-global-key-listener';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { CommandName } from '../../types';
import { type HotkeyBinding, matchBinding } from './hotkeyBindings';

export type HotkeyCommandHandler = (command: CommandName) => Promise<void> | void;

/**
 * Global key listener that turns bound key presses into commands. Keys are
 * never swallowed, and a held key fires once until it is released.
 */
export class HotkeyBridge {
  private readonly listener = new GlobalKeyboardListener();
  private readonly handler: IGlobalKeyListener;
  private readonly held = new Set<IGlobalKey>();
  private listening = false;

  public constructor(
    private readonly bindings: readonly HotkeyBinding[],
    private readonly onCommand: HotkeyCommandHandler,
    private readonly logger?: StructuredLogger
  ) {
    this.handler = (event, down) => this.onKeyEvent(event, down);
  }

  public describeBindings(): string[] {
    return this.bindings.map((binding) => `${binding.accelerator}=${binding.command}`);
  }

  public async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    await this.listener.addListener(this.handler);
    this.listening = true;
    this.logger?.info('Hotkey listener started', { bindings: this.describeBindings() });
  }

  public stop(): void {
    if (this.listening) {
      this.listener.removeListener(this.handler);
    }

    this.listener.kill();
    this.listening = false;
    this.held.clear();

    this.logger?.info('Hotkey listener stopped');
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    const keyName = event.name;
    if (!keyName) {
      return false;
    }

    if (event.state === 'UP') {
      this.held.delete(keyName);
      return false;
    }

    if (this.held.has(keyName)) {
      return false;
    }

    this.held.add(keyName);
    const binding = matchBinding(this.bindings, keyName, down);
    if (binding) {
      this.invokeSafely(binding);
    }

    return false;
  }

  private invokeSafely(binding: HotkeyBinding): void {
    Promise.resolve()
      .then(() => this.onCommand(binding.command))
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Hotkey command failed', {
          hotkey: binding.accelerator,
          command: binding.command,
          detail
        });
      });
  }
}
