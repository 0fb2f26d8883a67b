import { describe, expect, it } from 'vitest';

import { captureScreenshot } from '../src/browser/capture.js';
import { Scope } from '../src/core/scope.js';
import { createSlot } from '../src/core/slot.js';

describe('captureScreenshot', () => {
  it('writes png bytes of the viewport into the slot', async () => {
    const requests: unknown[] = [];
    const target = {
      page: {
        screenshot: async (options?: unknown) => {
          requests.push(options);
          return Buffer.from('png-bytes');
        },
      },
    };
    const image = createSlot<Buffer>();

    await captureScreenshot(target, image).run(Scope.background());

    expect(image.value?.toString()).toBe('png-bytes');
    expect(requests).toEqual([{ type: 'png', fullPage: false }]);
  });

  it('passes the full-page option through', async () => {
    const requests: unknown[] = [];
    const target = {
      page: {
        screenshot: async (options?: unknown) => {
          requests.push(options);
          return Buffer.from('');
        },
      },
    };

    await captureScreenshot(target, createSlot<Buffer>(), { fullPage: true }).run(
      Scope.background(),
    );

    expect(requests).toEqual([{ type: 'png', fullPage: true }]);
  });
});
