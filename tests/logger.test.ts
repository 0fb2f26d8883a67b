import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import * as log from '../src/utils/logger.js';

describe('logger', () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('writes domain lines to stderr', () => {
    log.navigated('https://example.test/');
    log.raced(1, 3);

    expect(written).toEqual([
      '🧭 Navigated to https://example.test/\n',
      '🏁 Action 2/3 finished first\n',
    ]);
  });

  it('prints debug lines only when TABRACE_DEBUG is on', () => {
    vi.stubEnv('TABRACE_DEBUG', '0');
    log.debug('hidden');

    vi.stubEnv('TABRACE_DEBUG', '1');
    log.debug('shown');

    expect(written).toEqual(['🐛 shown\n']);
  });
});
