import { readFile, writeFile } from 'node:fs/promises';

import type { Command } from 'commander';

import { launchSession } from '../browser/session.js';
import type { BrowserSession } from '../browser/session.js';
import { navigate } from '../browser/navigate.js';
import { location, title } from '../browser/location.js';
import { getCookies, injectCookies, parseCookieHeader, setCookies } from '../browser/cookies.js';
import { captureScreenshot } from '../browser/capture.js';
import { stealth } from '../browser/stealth.js';
import { waitText } from '../browser/text.js';
import { actionFunc } from '../core/action.js';
import { ScopeCancelledError } from '../core/errors.js';
import { intervalRun } from '../core/interval.js';
import { waitOneOf } from '../core/race.js';
import { Scope } from '../core/scope.js';
import { createSlot } from '../core/slot.js';
import type { Cookie } from '../schema/cookie.js';
import { parseCookieJSON } from '../schema/cookie.js';
import { navigationWaitModeSchema } from '../schema/config.js';
import { EXIT_CODES } from '../config/defaults.js';
import { loadEnvConfig, loadOptionalConfigFile } from '../config/loader.js';
import * as log from '../utils/logger.js';
import { exitCodeFor, mergeSettings, parseIntervalFlag } from './settings.js';
import type { CommonFlags, Settings } from './settings.js';

// ── Session runner ───────────────────────────────────────────

type SessionBody = (
  session: BrowserSession,
  scope: Scope,
  settings: Settings,
) => Promise<void>;

/**
 * Launch a browser, run `body` under a root scope bounded by the
 * configured timeout, and set the process exit code. Ctrl-C cancels
 * the scope.
 */
async function runInSession(
  url: string,
  flags: CommonFlags,
  body: SessionBody,
  { cancelIsSuccess = false }: { cancelIsSuccess?: boolean } = {},
): Promise<void> {
  let settings: Settings;
  try {
    const fileConfig = await loadOptionalConfigFile(flags.config);
    settings = mergeSettings(flags, loadEnvConfig(), fileConfig);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Config error: ${message}`);
    process.exitCode = EXIT_CODES.USAGE;
    return;
  }

  const root = Scope.background();
  const scope = root.withTimeout(settings.timeoutMs);
  const onInterrupt = (): void => {
    root.cancel(new ScopeCancelledError('interrupted'));
  };
  process.once('SIGINT', onInterrupt);

  let session: BrowserSession | undefined;
  try {
    session = await launchSession({ headless: settings.headless });
    await prepareSession(session, scope, settings, url);
    await body(session, scope, settings);
    process.exitCode = EXIT_CODES.OK;
  } catch (err) {
    if (cancelIsSuccess && err instanceof ScopeCancelledError) {
      log.detail(`Stopped: ${err.message}`);
      process.exitCode = EXIT_CODES.OK;
    } else {
      const message = err instanceof Error ? err.message : String(err);
      log.error(message);
      process.exitCode = exitCodeFor(err);
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    root.cancel();
    await session?.close();
  }
}

async function prepareSession(
  session: BrowserSession,
  scope: Scope,
  settings: Settings,
  url: string,
): Promise<void> {
  if (settings.stealth) {
    await stealth(session).run(scope);
  }

  if (settings.cookiesIn !== undefined) {
    const cookies = parseCookieJSON(await readFile(settings.cookiesIn, 'utf-8'));
    await setCookies(session, cookies).run(scope);
    log.detail(`Restored ${String(cookies.length)} cookies from ${settings.cookiesIn}`);
  }

  if (settings.cookie !== undefined) {
    await injectCookies(session, parseCookieHeader(settings.cookie, url)).run(scope);
  }
}

function writeJSON(payload: unknown): void {
  process.stdout.write(JSON.stringify(payload, null, 2) + '\n');
}

// ── Shared option wiring ─────────────────────────────────────

function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', '.tabrace.yaml')
    .option('--headless', 'Run browser headless')
    .option('--headed', 'Run browser with a visible window')
    .option('--timeout <seconds>', 'Overall deadline in seconds')
    .option('--stealth', 'Hide common headless fingerprints')
    .option('--cookie <string>', 'Cookie string ("name=value; name2=value2")')
    .option('--cookies-in <file>', 'Restore cookies from a JSON file')
    .option('--json', 'Output JSON to stdout');
}

// ── open ─────────────────────────────────────────────────────

interface OpenFlags extends CommonFlags {
  wait: string;
  screenshot?: string;
  cookiesOut?: string;
}

export function registerOpenCommand(program: Command): void {
  withCommonOptions(
    program
      .command('open')
      .description('Navigate to a URL, wait for it, and report where it landed')
      .argument('<url>', 'Target URL'),
  )
    .option('--wait <mode>', 'What to wait for: load, navigated or none', 'load')
    .option('--screenshot <file>', 'Save a PNG screenshot after navigation')
    .option('--cookies-out <file>', 'Save the context cookies as JSON')
    .action(async (url: string, opts: OpenFlags) => {
      await runInSession(url, opts, async (session, scope) => {
        const waitFor = navigationWaitModeSchema.parse(opts.wait);
        await navigate(session, url, { waitFor }).run(scope);
        log.navigated(url);

        const pageTitle = createSlot<string>();
        const current = createSlot<string>();
        await title(session, pageTitle).run(scope);
        await location(session, current).run(scope);

        if (opts.screenshot !== undefined) {
          const image = createSlot<Buffer>();
          await captureScreenshot(session, image).run(scope);
          await writeFile(opts.screenshot, image.expect());
          log.detail(`Screenshot saved to ${opts.screenshot}`);
        }

        let cookieCount: number | undefined;
        if (opts.cookiesOut !== undefined) {
          const cookies = createSlot<Cookie[]>();
          await getCookies(session, cookies).run(scope);
          cookieCount = cookies.expect().length;
          await writeFile(
            opts.cookiesOut,
            JSON.stringify(cookies.expect(), null, 2) + '\n',
            'utf-8',
          );
          log.detail(`${String(cookieCount)} cookies saved to ${opts.cookiesOut}`);
        }

        if (opts.json) {
          writeJSON({
            url: current.expect(),
            title: pageTitle.expect(),
            ...(cookieCount !== undefined ? { cookies: cookieCount } : {}),
          });
        } else {
          log.info(`Title:    ${pageTitle.expect()}`);
          log.info(`Location: ${current.expect()}`);
        }
      });
    });
}

// ── race ─────────────────────────────────────────────────────

interface RaceFlags extends CommonFlags {
  text: string[];
}

export function registerRaceCommand(program: Command): void {
  withCommonOptions(
    program
      .command('race')
      .description('Navigate, then report which of several texts appears first')
      .argument('<url>', 'Target URL'),
  )
    .requiredOption('--text <texts...>', 'Texts to race against each other')
    .action(async (url: string, opts: RaceFlags) => {
      await runInSession(url, opts, async (session, scope, settings) => {
        await navigate(session, url, { waitFor: 'navigated' }).run(scope);
        log.navigated(url);

        const winner = createSlot<number>();
        const contenders = opts.text.map((text) =>
          waitText(session, text, { tickMs: settings.pollTickMs }),
        );
        await waitOneOf(contenders, { winner }).run(scope);

        const index = winner.expect();
        log.raced(index, contenders.length);
        if (opts.json) {
          writeJSON({ index, text: opts.text[index] });
        } else {
          log.info(`First text to appear: "${opts.text[index] ?? ''}"`);
        }
      });
    });
}

// ── watch ────────────────────────────────────────────────────

interface WatchFlags extends CommonFlags {
  interval?: string;
}

export function registerWatchCommand(program: Command): void {
  withCommonOptions(
    program
      .command('watch')
      .description('Navigate, then log location and title changes until the deadline or Ctrl-C')
      .argument('<url>', 'Target URL'),
  )
    .option('--interval <ms>', 'Polling interval in milliseconds')
    .action(async (url: string, opts: WatchFlags) => {
      let intervalMs: number | undefined;
      try {
        intervalMs = parseIntervalFlag(opts.interval);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(message);
        process.exitCode = exitCodeFor(err);
        return;
      }

      await runInSession(
        url,
        opts,
        async (session, scope, settings) => {
          await navigate(session, url).run(scope);
          log.navigated(url);

          let last = '';

          const probe = actionFunc(async (tick) => {
            const current = createSlot<string>();
            const pageTitle = createSlot<string>();
            await location(session, current).run(tick);
            await title(session, pageTitle).run(tick);

            const line = `${current.expect()} | ${pageTitle.expect()}`;
            if (line === last) return;
            last = line;
            if (opts.json) {
              writeJSON({
                at: new Date().toISOString(),
                url: current.expect(),
                title: pageTitle.expect(),
              });
            } else {
              log.info(line);
            }
          });

          await intervalRun(intervalMs ?? settings.watchIntervalMs, probe).run(scope);
        },
        { cancelIsSuccess: true },
      );
    });
}
