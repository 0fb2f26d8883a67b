import type { Page } from 'playwright';

import type { Action } from '../core/action.js';
import { actionFunc } from '../core/action.js';
import type { Slot } from '../core/slot.js';
import { requireSlot } from '../core/slot.js';

export interface CaptureTarget {
  readonly page: Pick<Page, 'screenshot'>;
}

/**
 * Capture the current viewport as PNG bytes.
 * Pass `fullPage` to capture the whole scrollable page instead.
 */
export function captureScreenshot(
  target: CaptureTarget,
  image: Slot<Buffer>,
  options: { fullPage?: boolean } = {},
): Action {
  const slot = requireSlot(image, 'image');

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    const bytes = await target.page.screenshot({
      type: 'png',
      fullPage: options.fullPage ?? false,
    });
    slot.set(bytes);
  });
}
