import { describe, it, expect } from 'vitest';
import { readBearerToken } from '../middleware/auth.js';

describe('readBearerToken', () => {
  it('should report a missing header', () => {
    expect(readBearerToken(undefined)).toEqual({ ok: false, message: 'Missing Authorization header' });
  });

  it('should reject other schemes', () => {
    expect(readBearerToken('Basic dGVzdA==')).toEqual({
      ok: false,
      message: 'Invalid Authorization header format. Expected: Bearer <token>',
    });
  });

  it('should read the token regardless of scheme case', () => {
    expect(readBearerToken('bearer test-token')).toEqual({ ok: true, token: 'test-token' });
  });
});
