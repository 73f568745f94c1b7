import * as blessed from 'blessed';
import type { Widgets } from 'blessed';
import { DashboardError, ErrorCode } from '../types/errors';
import type { InputSource, TerminalSession } from '../core/render-driver';
import type { KeyInput } from '../core/keymap';

type KeyListener = (key: KeyInput) => void;

/**
 * Full-screen blessed session. Owns the alternate screen and raw mode between
 * open() and close(), and fans key presses out to subscribers.
 */
export class BlessedTerminal implements TerminalSession, InputSource {
  private readonly title: string;
  private current: Widgets.Screen | null = null;
  private readonly listeners = new Set<KeyListener>();

  constructor(title: string) {
    this.title = title;
  }

  get screen(): Widgets.Screen {
    if (this.current === null) {
      throw new DashboardError('Terminal is not open', ErrorCode.TERMINAL_ERROR);
    }
    return this.current;
  }

  open(): void {
    if (this.current !== null) return;
    try {
      const screen = blessed.screen({
        smartCSR: true,
        fullUnicode: true,
        title: this.title,
      });
      screen.on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
        this.emit({
          name: key?.name,
          ch,
          ctrl: key?.ctrl ?? false,
          shift: key?.shift ?? false,
        });
      });
      this.current = screen;
    } catch (error) {
      throw new DashboardError('Failed to initialise the terminal', ErrorCode.TERMINAL_ERROR, {
        originalError: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  close(): void {
    const screen = this.current;
    if (screen === null) return;
    this.current = null;
    screen.destroy();
  }

  onKey(listener: KeyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  render(): void {
    this.current?.render();
  }

  private emit(key: KeyInput): void {
    for (const listener of this.listeners) {
      listener(key);
    }
  }
}
