import type { BrowserContext } from 'playwright';

import type { Action } from '../core/action.js';
import { actionFunc } from '../core/action.js';
import type { Slot } from '../core/slot.js';
import { requireSlot } from '../core/slot.js';
import { cookieListSchema } from '../schema/cookie.js';
import type { Cookie } from '../schema/cookie.js';

// ── Public types ─────────────────────────────────────────────

export interface CookieTarget {
  readonly context: Pick<BrowserContext, 'cookies' | 'addCookies'>;
}

/** Cookie as accepted by `BrowserContext.addCookies`. */
export interface CookieParam {
  name: string;
  value: string;
  url?: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: Cookie['sameSite'];
}

// ── Mapping ──────────────────────────────────────────────────

export function cookieParamsFromCookies(
  cookies: readonly Cookie[],
): CookieParam[] {
  return cookies.map((c) => ({
    name: c.name,
    value: c.value,
    domain: c.domain,
    path: c.path,
    expires: c.expires,
    httpOnly: c.httpOnly,
    secure: c.secure,
    sameSite: c.sameSite,
  }));
}

/**
 * Parse a cookie string ("name=value; name2=value2") into params
 * scoped to `url`. Throws on a pair without '='.
 */
export function parseCookieHeader(header: string, url: string): CookieParam[] {
  return header
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((pair) => {
      const eqIdx = pair.indexOf('=');
      if (eqIdx === -1) {
        throw new Error(`Invalid cookie format: "${pair}" (expected name=value)`);
      }
      const name = pair.slice(0, eqIdx).trim();
      if (name.length === 0) {
        throw new Error(`Invalid cookie format: "${pair}" (empty name)`);
      }
      return { name, value: pair.slice(eqIdx + 1).trim(), url };
    });
}

// ── Actions ──────────────────────────────────────────────────

/** Restore cookies previously read with `getCookies`. */
export function setCookies(
  target: CookieTarget,
  cookies: readonly Cookie[],
): Action {
  return injectCookies(target, cookieParamsFromCookies(cookies));
}

export function injectCookies(
  target: CookieTarget,
  params: readonly CookieParam[],
): Action {
  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    if (params.length === 0) return;
    await target.context.addCookies(params);
  });
}

export function getCookies(
  target: CookieTarget,
  cookies: Slot<Cookie[]>,
): Action {
  const slot = requireSlot(cookies, 'cookies');

  return actionFunc(async (scope) => {
    scope.throwIfCancelled();
    const all = await target.context.cookies();
    slot.set(cookieListSchema.parse(all));
  });
}
