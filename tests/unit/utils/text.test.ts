import { describe, expect, it } from 'vitest';
import { sliceWhole, surrogateSafeIndex } from '../../../src/utils/text.js';

describe('surrogateSafeIndex', () => {
  it('leaves cuts between whole characters alone', () => {
    expect(surrogateSafeIndex('abc', 2)).toBe(2);
    expect(surrogateSafeIndex('a😀', 1)).toBe(1);
    expect(surrogateSafeIndex('a😀', 3)).toBe(3);
  });

  it('moves a cut inside a pair back by one', () => {
    expect(surrogateSafeIndex('a😀b', 2)).toBe(1);
  });

  it('passes positions outside the text through', () => {
    expect(surrogateSafeIndex('😀', 0)).toBe(0);
    expect(surrogateSafeIndex('😀', 5)).toBe(5);
  });
});

describe('sliceWhole', () => {
  it('never ends on a lone high surrogate', () => {
    expect(sliceWhole('ok😀', 3)).toBe('ok');
    expect(sliceWhole('ok😀', 4)).toBe('ok😀');
  });
});
