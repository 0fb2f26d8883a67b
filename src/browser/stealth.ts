import { readFile } from 'node:fs/promises';

import type { BrowserContext } from 'playwright';

import type { Action } from '../core/action.js';
import { actionFunc } from '../core/action.js';

// ── Public types ─────────────────────────────────────────────

export interface StealthTarget {
  readonly context: Pick<BrowserContext, 'addInitScript'>;
}

export interface StealthOptions {
  /** Make every iframe's contentWindow report the top window. Default true. */
  bypassIframeTest?: boolean | undefined;
}

// ── Script assembly ──────────────────────────────────────────

const BASE_SCRIPT = new URL('../../assets/stealth.js', import.meta.url);
const IFRAME_SCRIPT = new URL('../../assets/stealth-iframe.js', import.meta.url);

export async function loadStealthScript(
  options: StealthOptions = {},
): Promise<string> {
  const base = await readFile(BASE_SCRIPT, 'utf-8');
  if (!(options.bypassIframeTest ?? true)) {
    return base;
  }
  const iframe = await readFile(IFRAME_SCRIPT, 'utf-8');
  return `${base}\n${iframe}`;
}

// ── Action ───────────────────────────────────────────────────

/**
 * Register scripts that hide common headless-automation fingerprints.
 * Applies to documents created after the action runs.
 */
export function stealth(
  target: StealthTarget,
  options: StealthOptions = {},
): Action {
  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    const content = await loadStealthScript(options);
    await target.context.addInitScript({ content });
  });
}
