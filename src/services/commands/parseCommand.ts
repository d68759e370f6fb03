import { InvalidCommandError } from '../../errors';
import type { Command, CommandName } from '../../types';

const COMMAND_NAMES: readonly CommandName[] = [
  'START_RECORDING',
  'STOP_AND_TRANSCRIBE',
  'TOGGLE_LANGUAGE',
  'SET_LANGUAGE',
  'OPEN_LANGUAGE_MENU',
  'TOGGLE_ENTER',
  'TOGGLE_AUTO_TYPE',
  'RESET_TRANSCRIPTION',
  'TOGGLE_REALTIME_TRANSCRIPTION',
  'TRANSCRIBE_STATIC',
  'OPEN_CONFIG_DIALOG',
  'OPEN_AUDIO_SOURCE_MENU',
  'TOGGLE_AUDIO_SOURCE',
  'QUIT'
];

const COMMANDS_WITH_ARGUMENT = new Set<CommandName>(['SET_LANGUAGE', 'TRANSCRIBE_STATIC']);

const isCommandName = (value: string): value is CommandName =>
  COMMAND_NAMES.some((name) => name === value);

/**
 * Parses one command line. Names are case-sensitive; only `SET_LANGUAGE` and
 * `TRANSCRIBE_STATIC` take an argument, which is everything after the first space.
 */
export const parseCommand = (line: string): Command => {
  const trimmed = line.replace(/[\r\n]+$/, '').trim();
  if (!trimmed) {
    throw new InvalidCommandError('(empty)', 'no command given');
  }

  const spaceIndex = trimmed.indexOf(' ');
  const name = spaceIndex === -1 ? trimmed : trimmed.slice(0, spaceIndex);
  const argument = spaceIndex === -1 ? '' : trimmed.slice(spaceIndex + 1).trim();

  if (!isCommandName(name)) {
    throw new InvalidCommandError(name, 'unknown command');
  }

  if (argument && !COMMANDS_WITH_ARGUMENT.has(name)) {
    throw new InvalidCommandError(name, 'does not take an argument');
  }

  return argument ? { name, argument } : { name };
};

export const listCommandNames = (): readonly CommandName[] => COMMAND_NAMES;
