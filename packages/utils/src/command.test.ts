import { describe, it, expect } from 'vitest';
import { outputTail } from './command.js';

describe('outputTail', () => {
  it('keeps the last non-empty lines', () => {
    const output = 'line 1\n\nline 2\r\nline 3\n   \nline 4\n';
    expect(outputTail(output, 2)).toBe('line 3\nline 4');
  });

  it('returns everything when there are fewer lines than requested', () => {
    expect(outputTail('only line')).toBe('only line');
  });
});
