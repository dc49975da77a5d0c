import { parseBearerToken } from './parse-bearer-token.util';

describe('parseBearerToken', () => {
  it('strips the bearer scheme in any case', () => {
    expect(parseBearerToken('Bearer abc.def')).toBe('abc.def');
    expect(parseBearerToken('  bearer   abc.def ')).toBe('abc.def');
  });

  it('accepts a bare token', () => {
    expect(parseBearerToken('abc.def')).toBe('abc.def');
  });

  it('returns null when there is nothing to use', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('')).toBeNull();
    expect(parseBearerToken('Bearer    ')).toBeNull();
    expect(parseBearerToken('bearer')).toBeNull();
    expect(parseBearerToken('   ')).toBeNull();
  });
});
