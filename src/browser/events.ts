import type { Frame, Page } from 'playwright';

import { EventHub } from '../core/events.js';

// ── Page events ──────────────────────────────────────────────

export type PageEvent =
  | { type: 'load' }
  | { type: 'domcontentloaded' }
  | { type: 'framenavigated'; url: string; isMainFrame: boolean };

export interface PageEvents {
  readonly hub: EventHub<PageEvent>;
  /** Remove the Playwright listeners. The hub stops receiving events. */
  detach(): void;
}

/**
 * Bridge a Playwright page's lifecycle events into an `EventHub`.
 * Call once per page, before any navigation waits.
 */
export function attachPageEvents(page: Page): PageEvents {
  const hub = new EventHub<PageEvent>();

  const onLoad = (): void => {
    hub.emit({ type: 'load' });
  };
  const onDomContentLoaded = (): void => {
    hub.emit({ type: 'domcontentloaded' });
  };
  const onFrameNavigated = (frame: Frame): void => {
    hub.emit({
      type: 'framenavigated',
      url: frame.url(),
      isMainFrame: frame === page.mainFrame(),
    });
  };

  page.on('load', onLoad);
  page.on('domcontentloaded', onDomContentLoaded);
  page.on('framenavigated', onFrameNavigated);

  return {
    hub,
    detach(): void {
      page.off('load', onLoad);
      page.off('domcontentloaded', onDomContentLoaded);
      page.off('framenavigated', onFrameNavigated);
    },
  };
}
