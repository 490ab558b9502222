import { describe, it, expect } from 'vitest';
import $try from '../../src/utils/try.js';

describe('$try', () => {
  it('returns the result of a sync function', async () => {
    expect(await $try(() => 42)).toEqual([null, 42]);
  });

  it('returns the result of an async function', async () => {
    expect(await $try(async () => 'done')).toEqual([null, 'done']);
  });

  it('returns the message of a thrown error', async () => {
    const [err, result] = await $try(() => {
      throw new Error('boom');
    });
    expect(err?.message).toBe('boom');
    expect(err?.stack).toContain('boom');
    expect(result).toBeNull();
  });

  it('stringifies non-Error rejections', async () => {
    expect(await $try(() => Promise.reject('nope'))).toEqual([{ message: 'nope' }, null]);
  });
});
