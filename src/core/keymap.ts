import { Tab, TAB_ORDER } from './dashboard-state';
import type { DashboardAction } from './dashboard-state';

/** Terminal-agnostic key event */
export interface KeyInput {
  /** Key name as reported by the terminal, e.g. "up", "tab", "q" */
  name?: string;
  /** Printable character, when there is one */
  ch?: string;
  ctrl?: boolean;
  shift?: boolean;
}

export interface KeyBinding {
  keys: string;
  description: string;
}

export const KEY_BINDINGS: readonly KeyBinding[] = [
  { keys: '1-4', description: 'Jump to tab' },
  { keys: 'Tab / Right', description: 'Next tab' },
  { keys: 'Shift+Tab / Left', description: 'Previous tab' },
  { keys: 'Up / k, Down / j', description: 'Scroll process list' },
  { keys: 'PageUp / PageDown', description: 'Scroll one page' },
  { keys: 'Home / End', description: 'Top or bottom of process list' },
  { keys: 'r', description: 'Refresh now' },
  { keys: 'h / ?', description: 'Help' },
  { keys: 'q / Esc / Ctrl+C', description: 'Quit' },
];

/** Maps a key event to a dashboard action; unknown keys map to null */
export function resolveKey(key: KeyInput): DashboardAction | null {
  const name = key.name ?? key.ch ?? '';

  if (key.ctrl) {
    return name === 'c' ? { type: 'quit' } : null;
  }

  if (/^[1-4]$/.test(key.ch ?? '')) {
    const tab = TAB_ORDER[Number(key.ch) - 1];
    return tab !== undefined ? { type: 'jump', tab } : null;
  }

  switch (name) {
    case 'tab':
      return key.shift ? { type: 'prev' } : { type: 'next' };
    case 'right':
      return { type: 'next' };
    case 'left':
      return { type: 'prev' };
    case 'up':
    case 'k':
      return { type: 'scroll', delta: -1 };
    case 'down':
    case 'j':
      return { type: 'scroll', delta: 1 };
    case 'pageup':
      return { type: 'page', direction: -1 };
    case 'pagedown':
      return { type: 'page', direction: 1 };
    case 'home':
      return { type: 'scroll-to', position: 'top' };
    case 'end':
      return { type: 'scroll-to', position: 'bottom' };
    case 'r':
      return { type: 'refresh' };
    case 'h':
      return { type: 'jump', tab: Tab.Help };
    case 'q':
    case 'escape':
      return { type: 'quit' };
  }

  if (key.ch === '?') {
    return { type: 'jump', tab: Tab.Help };
  }

  return null;
}
