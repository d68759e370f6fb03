import { describe, expect, it } from 'vitest';
import { DEFAULT_HOTKEYS, matchBinding, parseAccelerator, parseBindings } from './hotkeyBindings';

describe('hotkeyBindings', () => {
  it('parses a bare function key and modifier combinations', () => {
    expect(parseAccelerator('F3')).toEqual({ triggerKey: 'F3', requiredModifierGroups: [] });
    expect(parseAccelerator('Ctrl+Shift+r')).toEqual({
      triggerKey: 'R',
      requiredModifierGroups: [
        ['LEFT CTRL', 'RIGHT CTRL'],
        ['LEFT SHIFT', 'RIGHT SHIFT']
      ]
    });
    expect(parseAccelerator('alt+space').triggerKey).toBe('SPACE');
  });

  it('rejects malformed accelerators', () => {
    expect(() => parseAccelerator('Ctrl+Shift')).toThrow('Hotkey missing a trigger key: Ctrl+Shift');
    expect(() => parseAccelerator('F3+F4')).toThrow('Hotkey must define exactly one non-modifier key: F3+F4');
    expect(() => parseAccelerator('Ctrl+F13')).toThrow("Unsupported hotkey token 'F13' in Ctrl+F13");
  });

  it('binds every default key to a command', () => {
    const bindings = parseBindings(DEFAULT_HOTKEYS);

    expect(bindings).toHaveLength(9);
    expect(bindings.find((binding) => binding.triggerKey === 'F3')?.command).toBe('START_RECORDING');
    expect(bindings.find((binding) => binding.triggerKey === 'F4')?.command).toBe('STOP_AND_TRANSCRIBE');
  });

  it('lets a later entry replace an earlier one for the same keys', () => {
    const bindings = parseBindings(['F3=START_RECORDING', 'f3=QUIT']);

    expect(bindings.map((binding) => binding.command)).toEqual(['QUIT']);
  });

  it('rejects entries without a known command', () => {
    expect(() => parseBindings(['F3'])).toThrow('Hotkey binding must look like KEY=COMMAND: F3');
    expect(() => parseBindings(['F3=RECORD'])).toThrow("Unknown command 'RECORD' in hotkey binding F3=RECORD");
  });

  it('prefers the binding with the most held modifiers', () => {
    const bindings = parseBindings(['F3=START_RECORDING', 'Shift+F3=RESET_TRANSCRIPTION']);

    expect(matchBinding(bindings, 'F3', {})?.command).toBe('START_RECORDING');
    expect(matchBinding(bindings, 'F3', { 'RIGHT SHIFT': true })?.command).toBe('RESET_TRANSCRIPTION');
    expect(matchBinding(bindings, 'F4', { 'RIGHT SHIFT': true })).toBeUndefined();
  });
});
