/**
 * Browser module.
 * Playwright-backed actions built on the core coordinators.
 * Each action takes the narrowest target it needs; a `BrowserSession`
 * satisfies all of them.
 */

export { launchSession } from './session.js';
export type { BrowserSession, SessionConfig } from './session.js';
export { attachPageEvents } from './events.js';
export type { PageEvent, PageEvents } from './events.js';
export {
  NavigationError,
  loadEventFired,
  frameNavigated,
  resolveNavigationWait,
  waitNavigation,
  waitNavigate,
  navigate,
  reload,
  adjacentHistoryEntry,
  navigationEntries,
  navigateToHistoryEntry,
  navigateBack,
  navigateForward,
  stopLoading,
} from './navigate.js';
export type {
  NavigationTarget,
  HistoryTarget,
  DevToolsChannel,
  NavigationWait,
  NavigateOptions,
  HistoryDirection,
} from './navigate.js';
export {
  location,
  title,
  waitNotLocation,
  waitLocationChanged,
} from './location.js';
export type { LocationTarget } from './location.js';
export {
  cookieParamsFromCookies,
  parseCookieHeader,
  setCookies,
  injectCookies,
  getCookies,
} from './cookies.js';
export type { CookieTarget, CookieParam } from './cookies.js';
export { captureScreenshot } from './capture.js';
export type { CaptureTarget } from './capture.js';
export { stealth, loadStealthScript } from './stealth.js';
export type { StealthTarget, StealthOptions } from './stealth.js';
export { waitText } from './text.js';
export type { TextTarget } from './text.js';
