/**
 * Dashboard State Machine
 *
 * Owns the UI state (active tab, process scroll position, pending refresh and
 * shutdown) and applies input actions to it. Driven only from the render loop.
 */

export enum Tab {
  Overview = 'overview',
  Processes = 'processes',
  Network = 'network',
  Help = 'help',
}

export const TAB_ORDER: readonly Tab[] = [Tab.Overview, Tab.Processes, Tab.Network, Tab.Help];

export const TAB_TITLES: Readonly<Record<Tab, string>> = {
  [Tab.Overview]: 'Overview',
  [Tab.Processes]: 'Processes',
  [Tab.Network]: 'Network',
  [Tab.Help]: 'Help',
};

export type DashboardAction =
  | { type: 'jump'; tab: Tab }
  | { type: 'next' }
  | { type: 'prev' }
  | { type: 'scroll'; delta: number }
  | { type: 'page'; direction: 1 | -1 }
  | { type: 'scroll-to'; position: 'top' | 'bottom' }
  | { type: 'refresh' }
  | { type: 'quit' };

export interface DispatchContext {
  /** Monotonic milliseconds */
  now: number;
  /** Rows in the current process list */
  processCount: number;
  /** Process rows that fit on screen */
  viewportHeight: number;
}

export interface DashboardState {
  readonly activeTab: Tab;
  readonly processScrollOffset: number;
  readonly lastTabSwitchAt: number;
  readonly refreshRequested: boolean;
  readonly shuttingDown: boolean;
}

export function maxScrollOffset(processCount: number, viewportHeight: number): number {
  return Math.max(0, processCount - Math.max(0, viewportHeight));
}

export class DashboardStateMachine {
  private readonly debounceMs: number;
  private activeTab: Tab = Tab.Overview;
  private processScrollOffset = 0;
  private lastTabSwitchAt = Number.NEGATIVE_INFINITY;
  private refreshRequested = false;
  private shuttingDown = false;

  constructor(debounceMs = 150) {
    this.debounceMs = Math.max(0, debounceMs);
  }

  get tab(): Tab {
    return this.activeTab;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** Returns true when the action changed anything */
  dispatch(action: DashboardAction, context: DispatchContext): boolean {
    if (this.shuttingDown) {
      return false;
    }

    switch (action.type) {
      case 'jump':
        return this.switchTo(action.tab, context.now);
      case 'next':
      case 'prev': {
        if (context.now - this.lastTabSwitchAt < this.debounceMs) {
          return false;
        }
        const step = action.type === 'next' ? 1 : -1;
        const index = TAB_ORDER.indexOf(this.activeTab);
        const target = TAB_ORDER[(index + step + TAB_ORDER.length) % TAB_ORDER.length];
        return target !== undefined && this.switchTo(target, context.now);
      }
      case 'scroll':
        return this.scrollTo(this.processScrollOffset + action.delta, context);
      case 'page':
        return this.scrollTo(this.processScrollOffset + action.direction * Math.max(1, context.viewportHeight), context);
      case 'scroll-to':
        return this.scrollTo(
          action.position === 'top' ? 0 : maxScrollOffset(context.processCount, context.viewportHeight),
          context,
        );
      case 'refresh':
        this.refreshRequested = true;
        return true;
      case 'quit':
        this.shuttingDown = true;
        return true;
    }
  }

  /** Re-fit the scroll offset after the process list or the viewport changed */
  clampScroll(processCount: number, viewportHeight: number): number {
    const max = maxScrollOffset(processCount, viewportHeight);
    if (this.processScrollOffset > max) {
      this.processScrollOffset = max;
    }
    return this.processScrollOffset;
  }

  /** Hands the pending refresh request to the caller exactly once */
  takeRefreshRequest(): boolean {
    const requested = this.refreshRequested;
    this.refreshRequested = false;
    return requested;
  }

  shutdown(): void {
    this.shuttingDown = true;
  }

  snapshot(): DashboardState {
    return {
      activeTab: this.activeTab,
      processScrollOffset: this.processScrollOffset,
      lastTabSwitchAt: this.lastTabSwitchAt,
      refreshRequested: this.refreshRequested,
      shuttingDown: this.shuttingDown,
    };
  }

  private switchTo(tab: Tab, now: number): boolean {
    if (tab === this.activeTab) {
      return false;
    }
    this.lastTabSwitchAt = now;
    this.activeTab = tab;
    this.processScrollOffset = 0;
    return true;
  }

  private scrollTo(offset: number, context: DispatchContext): boolean {
    if (this.activeTab !== Tab.Processes) {
      return false;
    }
    const max = maxScrollOffset(context.processCount, context.viewportHeight);
    const next = Math.min(max, Math.max(0, offset));
    if (next === this.processScrollOffset) {
      return false;
    }
    this.processScrollOffset = next;
    return true;
  }
}
