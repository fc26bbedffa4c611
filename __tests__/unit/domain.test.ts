import { describe, expect, it } from '@jest/globals';

import { challengeRecordName, isValidEmail, isValidHostname, normalizeDomain } from '../../src/index.js';

describe('domain helpers', () => {
  it('normalizes case, whitespace and the root dot', () => {
    expect(normalizeDomain(' Example.ORG. ')).toBe('example.org');
  });

  it.each(['example.org', 'www.example.org', 'xn--bcher-kva.example', '*.example.org', 'a-b.example.co.uk'])(
    'accepts %s',
    (name) => {
      expect(isValidHostname(name)).toBe(true);
    },
  );

  it.each(['', 'localhost', 'not a domain', '-bad.example.org', 'bad-.example.org', 'example.123', 'a..example.org', '*.*.example.org', `${'a'.repeat(64)}.example.org`])(
    'rejects %p',
    (name) => {
      expect(isValidHostname(name)).toBe(false);
    },
  );

  it('validates contact emails loosely', () => {
    expect(isValidEmail('admin@example.org')).toBe(true);
    expect(isValidEmail('admin@localhost')).toBe(false);
    expect(isValidEmail('admin example.org')).toBe(false);
  });

  it('puts the challenge record under _acme-challenge', () => {
    expect(challengeRecordName('example.org')).toBe('_acme-challenge.example.org');
    expect(challengeRecordName('*.example.org')).toBe('_acme-challenge.example.org');
  });
});
