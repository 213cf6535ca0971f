import { describe, it, expect } from 'vitest';
import { MAX_COMMAND_OUTPUT, appendBounded } from '../../src/executors/process.js';

describe('appendBounded', () => {
  it('should append while under the limit', () => {
    expect(appendBounded('abc', 'def', 10)).toBe('abcdef');
    expect(appendBounded('abcde', 'fghij', 10)).toBe('abcdefghij');
  });

  it('should keep only the tail once the limit is passed', () => {
    expect(appendBounded('abcdef', 'ghij', 5)).toBe('fghij');
    expect(appendBounded('', 'x'.repeat(12) + 'digest', 8)).toBe('xxdigest');
  });

  it('should cap long command output at the default limit', () => {
    let output = '';
    for (let i = 0; i < 100; i++) {
      output = appendBounded(output, `${'layer '.repeat(200)}\n`);
    }
    output = appendBounded(output, 'latest: digest: sha256:0a1b2c size: 528\n');

    expect(output).toHaveLength(MAX_COMMAND_OUTPUT);
    expect(output.endsWith('latest: digest: sha256:0a1b2c size: 528\n')).toBe(true);
  });
});
