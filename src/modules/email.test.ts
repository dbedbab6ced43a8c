import { describe, it, expect } from 'vitest';
import { buildEmailPattern, isValidEmail } from './email.js';

describe('buildEmailPattern', () => {
  it('escapes dots in the domain', () => {
    expect(buildEmailPattern('example.org').source).toBe('^[a-zA-Z0-9._%+-]+@example\\.org$');
  });
});

describe('isValidEmail', () => {
  const domain = 'uclan.ac.uk';

  it('accepts a local part using every allowed symbol', () => {
    expect(isValidEmail('a.b-c%d+e_f@uclan.ac.uk', domain)).toBe(true);
  });

  it('accepts a plain address', () => {
    expect(isValidEmail('jsmith12@uclan.ac.uk', domain)).toBe(true);
  });

  it('ignores surrounding whitespace', () => {
    expect(isValidEmail('  jsmith12@uclan.ac.uk\n', domain)).toBe(true);
  });

  it('rejects the domain in different case', () => {
    expect(isValidEmail('jsmith12@UCLAN.AC.UK', domain)).toBe(false);
  });

  it('rejects another domain', () => {
    expect(isValidEmail('user@other.ac.uk', domain)).toBe(false);
  });

  it('rejects a subdomain of the accepted domain', () => {
    expect(isValidEmail('user@students.uclan.ac.uk', domain)).toBe(false);
  });

  it('rejects text that is not an address', () => {
    expect(isValidEmail('not-an-email', domain)).toBe(false);
  });

  it('rejects a dot wildcard match', () => {
    expect(isValidEmail('user@uclanXac.uk', domain)).toBe(false);
  });

  it('rejects spaces and other symbols in the local part', () => {
    expect(isValidEmail('first last@uclan.ac.uk', domain)).toBe(false);
    expect(isValidEmail('user!@uclan.ac.uk', domain)).toBe(false);
  });

  it('rejects an empty local part', () => {
    expect(isValidEmail('@uclan.ac.uk', domain)).toBe(false);
  });
});
