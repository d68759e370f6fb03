import type { IGlobalKey } from 'node-global-key-listener';
import type { CommandName } from '../../types';
import { listCommandNames } from '../commands/parseCommand';

export interface HotkeyBinding {
  accelerator: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
  command: CommandName;
}

/** One function key per command. */
export const DEFAULT_HOTKEYS: readonly string[] = [
  'F2=TOGGLE_LANGUAGE',
  'F3=START_RECORDING',
  'F4=STOP_AND_TRANSCRIBE',
  'F5=TOGGLE_ENTER',
  'F6=RESET_TRANSCRIPTION',
  'F7=QUIT',
  'F8=OPEN_AUDIO_SOURCE_MENU',
  'F9=TOGGLE_REALTIME_TRANSCRIPTION',
  'F10=TRANSCRIBE_STATIC'
];

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  super: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT']
};

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE'
};

const MAIN_KEYS: readonly IGlobalKey[] = [
  'F1', 'F2', 'F3', 'F4', 'F5', 'F6', 'F7', 'F8', 'F9', 'F10', 'F11', 'F12',
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z',
  '0', '1', '2', '3', '4', '5', '6', '7', '8', '9'
];

const normalizeMainKeyToken = (token: string): IGlobalKey | undefined => {
  const upper = token.trim().toUpperCase();
  return MAIN_KEYS.find((key) => key === upper);
};

const toCommandName = (value: string): CommandName | undefined =>
  listCommandNames().find((name) => name === value);

/** Parses `F3` or `Ctrl+Shift+R`. */
export const parseAccelerator = (
  accelerator: string
): Pick<HotkeyBinding, 'triggerKey' | 'requiredModifierGroups'> => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  const requiredModifierGroups: IGlobalKey[][] = [];
  let triggerKey: IGlobalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      requiredModifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (triggerKey) {
      throw new Error(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    triggerKey = candidate;
  }

  if (!triggerKey) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  return { triggerKey, requiredModifierGroups };
};

/** Entries look like `F3=START_RECORDING`; a later entry for the same keys wins. */
export const parseBindings = (entries: readonly string[]): HotkeyBinding[] => {
  const byAccelerator = new Map<string, HotkeyBinding>();

  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator === -1) {
      throw new Error(`Hotkey binding must look like KEY=COMMAND: ${entry}`);
    }

    const accelerator = entry.slice(0, separator).trim();
    const commandText = entry.slice(separator + 1).trim();
    const command = toCommandName(commandText);
    if (!command) {
      throw new Error(`Unknown command '${commandText}' in hotkey binding ${entry}`);
    }

    byAccelerator.set(accelerator.toLowerCase(), { accelerator, command, ...parseAccelerator(accelerator) });
  }

  return Array.from(byAccelerator.values());
};

/** Keys currently held, as the listener reports them. */
export type KeysDown = Partial<Record<IGlobalKey, boolean>>;

const hasAnyKeyDown = (down: KeysDown, keys: IGlobalKey[]): boolean => keys.some((key) => down[key]);

/**
 * Picks the binding for a key press. When several share the trigger key, the
 * one requiring the most modifiers wins, so `Shift+F3` is not shadowed by `F3`.
 */
export const matchBinding = (
  bindings: readonly HotkeyBinding[],
  keyName: IGlobalKey,
  down: KeysDown
): HotkeyBinding | undefined => {
  let best: HotkeyBinding | undefined;

  for (const binding of bindings) {
    if (binding.triggerKey !== keyName) {
      continue;
    }

    if (!binding.requiredModifierGroups.every((group) => hasAnyKeyDown(down, group))) {
      continue;
    }

    if (!best || binding.requiredModifierGroups.length > best.requiredModifierGroups.length) {
      best = binding;
    }
  }

  return best;
};
