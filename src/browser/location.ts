import type { Page } from 'playwright';

import type { Action } from '../core/action.js';
import { actionFunc } from '../core/action.js';
import { continueWaiting, success } from '../core/outcome.js';
import type { WaitUntilOptions } from '../core/poll.js';
import { waitUntil } from '../core/poll.js';
import type { Slot } from '../core/slot.js';
import { requireSlot } from '../core/slot.js';

export interface LocationTarget {
  readonly page: Pick<Page, 'url' | 'title'>;
}

// ── Readers ───────────────────────────────────────────────────

export function location(target: LocationTarget, url: Slot<string>): Action {
  const slot = requireSlot(url, 'url');
  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    slot.set(target.page.url());
  });
}

export function title(target: LocationTarget, pageTitle: Slot<string>): Action {
  const slot = requireSlot(pageTitle, 'title');
  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    slot.set(await target.page.title());
  });
}

// ── Waiters ───────────────────────────────────────────────────

/**
 * Poll the document location until it differs from `not`.
 * The new location is written to `changed` when given.
 */
export function waitNotLocation(
  target: LocationTarget,
  not: string,
  changed?: Slot<string>,
  options: WaitUntilOptions = {},
): Action {
  return waitUntil(() => {
    const current = target.page.url();
    if (current === not) {
      return continueWaiting();
    }
    changed?.set(current);
    return success();
  }, options);
}

/** Wait until the location moves away from wherever it is when this runs. */
export function waitLocationChanged(
  target: LocationTarget,
  changed?: Slot<string>,
  options: WaitUntilOptions = {},
): Action {
  return actionFunc(async (scope) => {
    const initial = target.page.url();
    await waitNotLocation(target, initial, changed, options).run(scope);
  });
}
