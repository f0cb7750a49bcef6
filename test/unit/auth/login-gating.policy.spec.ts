import { describe, it, expect } from 'vitest';
import { getLoginGatingFailure } from '../../../src/modules/auth/policies/login-gating.policy';

describe('getLoginGatingFailure', () => {
  it('gives unknown email and wrong password the same error', () => {
    const unknown = getLoginGatingFailure({
      userFound: false,
      passwordValid: false,
      isActive: false,
    });
    const wrong = getLoginGatingFailure({ userFound: true, passwordValid: false, isActive: true });

    expect(unknown?.reason).toBe('user_not_found');
    expect(wrong?.reason).toBe('wrong_password');
    expect(unknown?.error.status).toBe(401);
    expect(unknown?.error.message).toBe('Incorrect email or password');
    expect(wrong?.error.message).toBe(unknown?.error.message);
  });

  it('rejects an inactive user only after the password is proven', () => {
    const res = getLoginGatingFailure({ userFound: true, passwordValid: true, isActive: false });

    expect(res?.reason).toBe('inactive');
    expect(res?.error.status).toBe(403);
    expect(res?.error.message).toBe('Inactive user');
  });

  it('does not reveal inactivity to a wrong password', () => {
    const res = getLoginGatingFailure({ userFound: true, passwordValid: false, isActive: false });
    expect(res?.reason).toBe('wrong_password');
  });

  it('passes an active user with the right password', () => {
    expect(
      getLoginGatingFailure({ userFound: true, passwordValid: true, isActive: true }),
    ).toBeNull();
  });
});
