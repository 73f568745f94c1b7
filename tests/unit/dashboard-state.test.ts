import { describe, expect, it } from 'vitest';
import { DashboardStateMachine, Tab, maxScrollOffset } from '../../src/core/dashboard-state';
import type { DispatchContext } from '../../src/core/dashboard-state';

const at = (now: number, processCount = 50, viewportHeight = 10): DispatchContext => ({ now, processCount, viewportHeight });

describe('DashboardStateMachine', () => {
  it('starts on Overview with no pending refresh', () => {
    const state = new DashboardStateMachine();
    expect(state.snapshot()).toEqual({
      activeTab: Tab.Overview,
      processScrollOffset: 0,
      lastTabSwitchAt: Number.NEGATIVE_INFINITY,
      refreshRequested: false,
      shuttingDown: false,
    });
  });

  describe('tab cycling', () => {
    it('accepts only the first of two cycles inside the debounce window', () => {
      const state = new DashboardStateMachine(150);

      expect(state.dispatch({ type: 'next' }, at(1000))).toBe(true);
      expect(state.dispatch({ type: 'next' }, at(1100))).toBe(false);
      expect(state.tab).toBe(Tab.Processes);
    });

    it('accepts two cycles 200 ms apart', () => {
      const state = new DashboardStateMachine(150);

      state.dispatch({ type: 'next' }, at(1000));
      state.dispatch({ type: 'next' }, at(1200));
      expect(state.tab).toBe(Tab.Network);
    });

    it('drops rejected transitions instead of queueing them', () => {
      const state = new DashboardStateMachine(150);

      state.dispatch({ type: 'next' }, at(1000));
      state.dispatch({ type: 'next' }, at(1050));
      state.dispatch({ type: 'next' }, at(1100));
      state.dispatch({ type: 'next' }, at(1160));
      expect(state.tab).toBe(Tab.Network);
    });

    it('wraps in both directions', () => {
      const state = new DashboardStateMachine(0);

      state.dispatch({ type: 'prev' }, at(0));
      expect(state.tab).toBe(Tab.Help);
      state.dispatch({ type: 'next' }, at(1));
      expect(state.tab).toBe(Tab.Overview);
    });
  });

  describe('direct jumps', () => {
    it('switches immediately regardless of the debounce timer', () => {
      const state = new DashboardStateMachine(150);

      state.dispatch({ type: 'next' }, at(1000));
      expect(state.dispatch({ type: 'jump', tab: Tab.Help }, at(1001))).toBe(true);
      expect(state.tab).toBe(Tab.Help);
    });

    it('jumps from Overview to Processes', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(5));
      expect(state.tab).toBe(Tab.Processes);
    });

    it('starts a new debounce window', () => {
      const state = new DashboardStateMachine(150);

      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(1000));
      expect(state.dispatch({ type: 'next' }, at(1100))).toBe(false);
      expect(state.tab).toBe(Tab.Processes);
    });

    it('leaves the debounce window alone when jumping to the active tab', () => {
      const state = new DashboardStateMachine(150);

      expect(state.dispatch({ type: 'jump', tab: Tab.Overview }, at(1000))).toBe(false);
      expect(state.snapshot().lastTabSwitchAt).toBe(Number.NEGATIVE_INFINITY);
      expect(state.dispatch({ type: 'next' }, at(1050))).toBe(true);
      expect(state.tab).toBe(Tab.Processes);
    });
  });

  describe('scrolling', () => {
    it('is ignored outside the Processes tab', () => {
      const state = new DashboardStateMachine();
      expect(state.dispatch({ type: 'scroll', delta: 1 }, at(0))).toBe(false);
      expect(state.snapshot().processScrollOffset).toBe(0);
    });

    it('stays within [0, count - viewport] under over-scrolling', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(0));

      state.dispatch({ type: 'scroll', delta: -1 }, at(1, 15, 10));
      expect(state.snapshot().processScrollOffset).toBe(0);

      for (let i = 0; i < 20; i++) {
        state.dispatch({ type: 'scroll', delta: 1 }, at(2 + i, 15, 10));
      }
      expect(state.snapshot().processScrollOffset).toBe(5);
    });

    it('pages by the viewport height and jumps to either end', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(0));

      state.dispatch({ type: 'page', direction: 1 }, at(1, 50, 10));
      expect(state.snapshot().processScrollOffset).toBe(10);
      state.dispatch({ type: 'scroll-to', position: 'bottom' }, at(2, 50, 10));
      expect(state.snapshot().processScrollOffset).toBe(40);
      state.dispatch({ type: 'page', direction: -1 }, at(3, 50, 10));
      expect(state.snapshot().processScrollOffset).toBe(30);
      state.dispatch({ type: 'scroll-to', position: 'top' }, at(4, 50, 10));
      expect(state.snapshot().processScrollOffset).toBe(0);
    });

    it('never scrolls when everything fits', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(0));

      expect(state.dispatch({ type: 'scroll', delta: 1 }, at(1, 5, 10))).toBe(false);
      expect(state.snapshot().processScrollOffset).toBe(0);
    });

    it('resets the offset when the tab changes', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(0));
      state.dispatch({ type: 'scroll', delta: 3 }, at(1));

      state.dispatch({ type: 'jump', tab: Tab.Overview }, at(2));
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(3));
      expect(state.snapshot().processScrollOffset).toBe(0);
    });

    it('re-clamps when the list shrinks', () => {
      const state = new DashboardStateMachine();
      state.dispatch({ type: 'jump', tab: Tab.Processes }, at(0));
      state.dispatch({ type: 'scroll-to', position: 'bottom' }, at(1, 50, 10));

      expect(state.clampScroll(12, 10)).toBe(2);
      expect(state.clampScroll(3, 10)).toBe(0);
    });
  });

  it('hands out a refresh request exactly once', () => {
    const state = new DashboardStateMachine();
    state.dispatch({ type: 'refresh' }, at(0));

    expect(state.snapshot().refreshRequested).toBe(true);
    expect(state.takeRefreshRequest()).toBe(true);
    expect(state.takeRefreshRequest()).toBe(false);
  });

  it('ignores every event after quit', () => {
    const state = new DashboardStateMachine();
    state.dispatch({ type: 'quit' }, at(0));

    expect(state.isShuttingDown).toBe(true);
    expect(state.dispatch({ type: 'jump', tab: Tab.Help }, at(1))).toBe(false);
    expect(state.dispatch({ type: 'refresh' }, at(2))).toBe(false);
    expect(state.tab).toBe(Tab.Overview);
  });
});

describe('maxScrollOffset', () => {
  it('is count minus viewport, floored at zero', () => {
    expect(maxScrollOffset(15, 10)).toBe(5);
    expect(maxScrollOffset(3, 10)).toBe(0);
    expect(maxScrollOffset(3, -2)).toBe(3);
  });
});
