import type { Page } from 'playwright';

import type { Action } from '../core/action.js';
import { continueWaiting, success } from '../core/outcome.js';
import type { WaitUntilOptions } from '../core/poll.js';
import { waitUntil } from '../core/poll.js';

export interface TextTarget {
  readonly page: Pick<Page, 'getByText'>;
}

/** Poll until at least one element whose text contains `text` is attached. */
export function waitText(
  target: TextTarget,
  text: string,
  options: WaitUntilOptions = {},
): Action {
  return waitUntil(async () => {
    const count = await target.page.getByText(text).count();
    return count > 0 ? success() : continueWaiting();
  }, options);
}
