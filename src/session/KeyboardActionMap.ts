/**
 * Default key bindings of the version dialog and the lookup from a key
 * press to a navigation command.
 *
 * Key strings look like "Ctrl+Up" or "Enter". Arrow keys may be written
 * either as `Up` or `ArrowUp`; Meta (Cmd) is treated as Ctrl.
 */

import { ValidationError } from '../core/errors';

export type NavigationCommand =
  | 'maxVersion'
  | 'minVersion'
  | 'nextVersion'
  | 'prevVersion'
  | 'confirm'
  | 'cancel'
  | 'openFolder';

export interface KeyCombination {
  key: string;
  ctrl?: boolean;
  shift?: boolean;
  alt?: boolean;
  meta?: boolean;
}

export interface CommandBinding {
  keys: readonly string[];
  description: string;
}

export const DEFAULT_COMMAND_BINDINGS: Readonly<Record<NavigationCommand, CommandBinding>> = {
  maxVersion: { keys: ['Ctrl+Up', 'Ctrl+Right'], description: 'Jump to the highest version' },
  nextVersion: { keys: ['Up', 'Right'], description: 'Next version' },
  prevVersion: { keys: ['Down', 'Left'], description: 'Previous version' },
  minVersion: { keys: ['Ctrl+Down', 'Ctrl+Left'], description: 'Jump to the lowest version' },
  confirm: { keys: ['Enter'], description: 'Apply the selected version' },
  cancel: { keys: ['Escape'], description: 'Restore the original versions' },
  openFolder: { keys: ['Ctrl+O'], description: 'Open the version folder' },
};

const KEY_ALIASES: Readonly<Record<string, string>> = {
  arrowup: 'up',
  arrowdown: 'down',
  arrowleft: 'left',
  arrowright: 'right',
  esc: 'escape',
  return: 'enter',
};

function normalizeKey(key: string): string {
  const lower = key.toLowerCase();
  return KEY_ALIASES[lower] ?? lower;
}

/**
 * Parse a key string like "Ctrl+Up" into a KeyCombination.
 * @throws ValidationError for empty strings or a missing key
 */
export function parseKeyString(keyStr: string): KeyCombination {
  const parts = keyStr.split('+').map((p) => p.trim());
  const key = parts[parts.length - 1];
  if (!key) {
    throw new ValidationError(`Invalid key string: "${keyStr}"`);
  }

  const combo: KeyCombination = { key: normalizeKey(key) };
  for (const part of parts.slice(0, -1)) {
    switch (part.toLowerCase()) {
      case 'ctrl':
      case 'control':
        combo.ctrl = true;
        break;
      case 'shift':
        combo.shift = true;
        break;
      case 'alt':
        combo.alt = true;
        break;
      case 'meta':
      case 'cmd':
      case 'command':
        combo.meta = true;
        break;
      default:
        throw new ValidationError(`Unknown modifier "${part}" in "${keyStr}"`);
    }
  }
  return combo;
}

/** Stable id of a combination; Meta folds into Ctrl. */
export function comboToId(combo: KeyCombination): string {
  const parts: string[] = [];
  if (combo.ctrl || combo.meta) parts.push('ctrl');
  if (combo.shift) parts.push('shift');
  if (combo.alt) parts.push('alt');
  parts.push(normalizeKey(combo.key));
  return parts.join('+');
}

export class KeyboardActionMap {
  private readonly byId = new Map<string, NavigationCommand>();

  constructor(bindings: Readonly<Record<NavigationCommand, CommandBinding>> = DEFAULT_COMMAND_BINDINGS) {
    for (const [command, binding] of entries(bindings)) {
      for (const keyStr of binding.keys) {
        const id = comboToId(parseKeyString(keyStr));
        const existing = this.byId.get(id);
        if (existing && existing !== command) {
          throw new ValidationError(`Key "${keyStr}" is bound to both ${existing} and ${command}`);
        }
        this.byId.set(id, command);
      }
    }
  }

  /** Command bound to a key string or combination, or null. */
  resolveCommand(key: string | KeyCombination): NavigationCommand | null {
    const combo = typeof key === 'string' ? parseKeyString(key) : key;
    return this.byId.get(comboToId(combo)) ?? null;
  }

  /** All bound key ids, e.g. for a shortcut cheat sheet. */
  get boundKeys(): string[] {
    return [...this.byId.keys()];
  }
}

function entries(
  bindings: Readonly<Record<NavigationCommand, CommandBinding>>
): [NavigationCommand, CommandBinding][] {
  return [
    ['maxVersion', bindings.maxVersion],
    ['nextVersion', bindings.nextVersion],
    ['prevVersion', bindings.prevVersion],
    ['minVersion', bindings.minVersion],
    ['confirm', bindings.confirm],
    ['cancel', bindings.cancel],
    ['openFolder', bindings.openFolder],
  ];
}
