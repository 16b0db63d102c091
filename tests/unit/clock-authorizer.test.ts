import { ManualClock, systemClock } from '../../src/core/Clock';
import { StaticAuthorizer } from '../../src/core/Authorizer';

describe('ManualClock', () => {
  test('advances and sets forward only', () => {
    const clock = new ManualClock(10);
    expect(clock.advance(2.5)).toBe(12.5);
    clock.set(20);
    expect(clock.now()).toBe(20);
    expect(() => clock.set(19)).toThrow('Clock cannot move backwards (19 < 20)');
  });

  test('system clock is monotonic', () => {
    const a = systemClock.now();
    const b = systemClock.now();
    expect(b).toBeGreaterThanOrEqual(a);
  });
});

describe('StaticAuthorizer', () => {
  test('grants and revokes', () => {
    const auth = new StaticAuthorizer(['mod-1']);
    expect(auth.isPrivileged('mod-1')).toBe(true);
    expect(auth.isPrivileged('p1')).toBe(false);
    auth.grant('p1');
    expect(auth.list()).toEqual(['mod-1', 'p1']);
    expect(auth.revoke('mod-1')).toBe(true);
    expect(auth.revoke('mod-1')).toBe(false);
    expect(auth.isPrivileged('mod-1')).toBe(false);
  });
});
