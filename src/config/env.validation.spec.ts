import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('accepts a known time zone for complaint numbers', () => {
    const env = { COMPLAINT_ID_TIME_ZONE: 'Asia/Kolkata', COMPLAINT_REOPEN_POLICY: 'resolved' };
    expect(validateEnv(env)).toBe(env);
    expect(validateEnv({ COMPLAINT_ID_TIME_ZONE: 'UTC' })).toEqual({
      COMPLAINT_ID_TIME_ZONE: 'UTC',
    });
  });

  it('refuses to boot with an unknown time zone', () => {
    expect(() => validateEnv({ COMPLAINT_ID_TIME_ZONE: 'Mars/Olympus' })).toThrow(
      /^Invalid environment: .*COMPLAINT_ID_TIME_ZONE/,
    );
  });

  it('refuses an unknown reopen policy', () => {
    expect(() => validateEnv({ COMPLAINT_REOPEN_POLICY: 'always' })).toThrow(
      /COMPLAINT_REOPEN_POLICY/,
    );
  });
});
