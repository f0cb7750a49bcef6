import { describe, it, expect } from 'vitest';
import { containsPattern } from '../../../src/modules/emails/dal/email.query-sql';

describe('containsPattern', () => {
  it('wraps the term for a substring match', () => {
    expect(containsPattern('example.com')).toBe('%example.com%');
  });

  it('matches LIKE wildcards and backslashes literally', () => {
    expect(containsPattern('50%_off')).toBe('%50\\%\\_off%');
    expect(containsPattern('a\\b')).toBe('%a\\\\b%');
  });
});
