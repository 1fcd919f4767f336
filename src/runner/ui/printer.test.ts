import { describe, expect, it } from 'vitest';

import { pad } from './printer';

describe('pad', () => {
  it('right-pads to the step column', () => {
    expect(pad('Loading')).toBe(`Loading${' '.repeat(20)}`);
    expect(pad('x', 3)).toBe('x  ');
  });

  it('leaves long labels alone', () => {
    const long = 'a'.repeat(30);
    expect(pad(long)).toBe(long);
  });
});
