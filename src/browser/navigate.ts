import type { Page } from 'playwright';

import type { Action } from '../core/action.js';
import { actionFunc } from '../core/action.js';
import type { EventSource } from '../core/events.js';
import { notMatched, success } from '../core/outcome.js';
import type { Scope } from '../core/scope.js';
import type { Slot } from '../core/slot.js';
import { requireSlot } from '../core/slot.js';
import type { EventPredicate } from '../core/wait-event.js';
import { waitForEvent } from '../core/wait-event.js';
import { TIMING } from '../config/defaults.js';
import { navigationHistorySchema } from '../schema/navigation.js';
import type { NavigationEntry, NavigationHistory } from '../schema/navigation.js';
import type { PageEvent } from './events.js';

// ── Error ─────────────────────────────────────────────────────

export class NavigationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NavigationError';
  }
}

// ── Targets ───────────────────────────────────────────────────

export interface NavigationTarget {
  readonly page: Pick<Page, 'goto' | 'reload'>;
  readonly events: EventSource<PageEvent>;
}

/**
 * The part of a DevTools session the history actions use. Playwright's
 * `CDPSession` satisfies it; replies are validated before use.
 */
export interface DevToolsChannel {
  send(method: string, params?: { entryId: number }): Promise<unknown>;
}

export interface HistoryTarget {
  readonly cdp: DevToolsChannel;
  readonly events: EventSource<PageEvent>;
}

// ── Wait options ──────────────────────────────────────────────

/**
 * What a navigation action waits for after issuing its request:
 *   - 'load'      → the page's load event (default)
 *   - 'navigated' → the main frame committing a navigation
 *   - 'none'      → nothing; resolve as soon as the request is sent
 *   - a predicate → the first event it matches
 */
export type NavigationWait = 'load' | 'navigated' | 'none' | EventPredicate<PageEvent>;

export interface NavigateOptions {
  readonly waitFor?: NavigationWait | undefined;
}

export const loadEventFired: EventPredicate<PageEvent> = (_scope, event) =>
  event.type === 'load' ? success() : notMatched();

export const frameNavigated: EventPredicate<PageEvent> = (_scope, event) =>
  event.type === 'framenavigated' && event.isMainFrame ? success() : notMatched();

export function resolveNavigationWait(
  wait: NavigationWait = 'load',
): EventPredicate<PageEvent> | null {
  switch (wait) {
    case 'load':
      return loadEventFired;
    case 'navigated':
      return frameNavigated;
    case 'none':
      return null;
    default:
      return wait;
  }
}

/**
 * Wait for the navigation event selected by `options`.
 * Subscribes on call, so an event fired before this runs is missed;
 * see `waitForEvent`.
 */
export function waitNavigation(
  scope: Scope,
  events: EventSource<PageEvent>,
  options: NavigateOptions = {},
): Promise<void> {
  return waitForEvent(scope, events, resolveNavigationWait(options.waitFor));
}

// ── Actions ───────────────────────────────────────────────────

export function waitNavigate(
  target: Pick<NavigationTarget, 'events'>,
  options: NavigateOptions = {},
): Action {
  return actionFunc((scope) => waitNavigation(scope, target.events, options));
}

/** Navigate the main frame to `url`. */
export function navigate(
  target: NavigationTarget,
  url: string,
  options: NavigateOptions = {},
): Action {
  const predicate = resolveNavigationWait(options.waitFor);

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    await target.page.goto(url, {
      waitUntil: 'commit',
      timeout: TIMING.NAVIGATION_TIMEOUT_MS,
    });
    await waitForEvent(scope, target.events, predicate);
  });
}

export function reload(
  target: NavigationTarget,
  options: NavigateOptions = {},
): Action {
  const predicate = resolveNavigationWait(options.waitFor);

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    await target.page.reload({
      waitUntil: 'commit',
      timeout: TIMING.NAVIGATION_TIMEOUT_MS,
    });
    await waitForEvent(scope, target.events, predicate);
  });
}

// ── History ───────────────────────────────────────────────────

async function readHistory(cdp: DevToolsChannel): Promise<NavigationHistory> {
  const raw = await cdp.send('Page.getNavigationHistory');
  return navigationHistorySchema.parse(raw);
}

export type HistoryDirection = 'back' | 'forward';

/** Entry one step back or forward from `currentIndex`. */
export function adjacentHistoryEntry(
  currentIndex: number,
  entries: readonly NavigationEntry[],
  direction: HistoryDirection,
): NavigationEntry {
  const inRange =
    direction === 'back'
      ? currentIndex > 0 && currentIndex <= entries.length - 1
      : currentIndex >= 0 && currentIndex < entries.length - 1;
  const entry = inRange
    ? entries[direction === 'back' ? currentIndex - 1 : currentIndex + 1]
    : undefined;

  if (!entry) {
    throw new NavigationError('invalid navigation entry');
  }
  return entry;
}

export function navigationEntries(
  target: Pick<HistoryTarget, 'cdp'>,
  currentIndex: Slot<number>,
  entries: Slot<NavigationEntry[]>,
): Action {
  const indexSlot = requireSlot(currentIndex, 'currentIndex');
  const entriesSlot = requireSlot(entries, 'entries');

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    const history = await readHistory(target.cdp);
    indexSlot.set(history.currentIndex);
    entriesSlot.set(history.entries);
  });
}

export function navigateToHistoryEntry(
  target: HistoryTarget,
  entryId: number,
  options: NavigateOptions = {},
): Action {
  const predicate = resolveNavigationWait(options.waitFor);

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    await target.cdp.send('Page.navigateToHistoryEntry', { entryId });
    await waitForEvent(scope, target.events, predicate);
  });
}

function navigateHistory(
  target: HistoryTarget,
  direction: HistoryDirection,
  options: NavigateOptions,
): Action {
  const predicate = resolveNavigationWait(options.waitFor);

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    const history = await readHistory(target.cdp);
    const entry = adjacentHistoryEntry(
      history.currentIndex,
      history.entries,
      direction,
    );
    await target.cdp.send('Page.navigateToHistoryEntry', { entryId: entry.id });
    await waitForEvent(scope, target.events, predicate);
  });
}

export function navigateBack(
  target: HistoryTarget,
  options: NavigateOptions = {},
): Action {
  return navigateHistory(target, 'back', options);
}

export function navigateForward(
  target: HistoryTarget,
  options: NavigateOptions = {},
): Action {
  return navigateHistory(target, 'forward', options);
}

/** Stop all navigation and pending resource retrieval. */
export function stopLoading(target: Pick<HistoryTarget, 'cdp'>): Action {
  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    await target.cdp.send('Page.stopLoading');
  });
}
