import { chromium } from 'playwright';
import type { BrowserContext, CDPSession, Page } from 'playwright';

import type { EventSource } from '../core/events.js';
import { attachPageEvents } from './events.js';
import type { PageEvent } from './events.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  headless: boolean;
}

/**
 * A launched Chromium page plus everything the actions need from it.
 * Satisfies every `*Target` interface in this module.
 */
export interface BrowserSession {
  readonly page: Page;
  readonly context: BrowserContext;
  readonly cdp: CDPSession;
  readonly events: EventSource<PageEvent>;
  close(): Promise<void>;
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(
  config: SessionConfig,
): Promise<BrowserSession> {
  const browser = await chromium.launch({ headless: config.headless });

  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    const cdp = await context.newCDPSession(page);
    const pageEvents = attachPageEvents(page);

    return {
      page,
      context,
      cdp,
      events: pageEvents.hub,

      async close(): Promise<void> {
        pageEvents.detach();
        await browser.close();
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
