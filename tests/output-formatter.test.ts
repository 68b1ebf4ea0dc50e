import { describe, expect, it } from 'vitest';
import { formatTable } from '../src/utils/output-formatter.js';

describe('formatTable', () => {
  it('accepts command lines holding control characters', () => {
    let text = '';
    expect(() => {
      text = formatTable(['PID', 'PROCESS'], [['7', 'sh\t-c\x01x\nrm']]);
    }).not.toThrow();
    expect(text).toContain('sh -c x rm');
  });
});
