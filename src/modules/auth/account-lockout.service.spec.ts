import { LockState, resolveLockState } from './account-lockout.service';

const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('resolveLockState', () => {
  it('is open for an unlocked account', () => {
    expect(resolveLockState({ isLocked: false, lockUntil: null }, NOW)).toBe(
      LockState.OPEN,
    );
  });

  it('is locked until lockUntil', () => {
    const lockUntil = new Date(NOW.getTime() + 1000);
    expect(resolveLockState({ isLocked: true, lockUntil }, NOW)).toBe(
      LockState.LOCKED,
    );
  });

  it('expires at lockUntil', () => {
    expect(resolveLockState({ isLocked: true, lockUntil: NOW }, NOW)).toBe(
      LockState.EXPIRED,
    );
  });

  it('treats a lock without an end as expired', () => {
    expect(resolveLockState({ isLocked: true, lockUntil: null }, NOW)).toBe(
      LockState.EXPIRED,
    );
  });
});
