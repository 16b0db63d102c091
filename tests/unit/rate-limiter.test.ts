import { RateLimiter } from '../../src/core/RateLimiter';
import { SubjectStore } from '../../src/core/SubjectStore';
import { EndpointPolicyTable } from '../../src/core/EndpointPolicyTable';
import { AdaptiveThrottle } from '../../src/core/AdaptiveThrottle';
import { SlidingWindowLimiter } from '../../src/core/SlidingWindowLimiter';
import { createConfig } from '../../src/config/GuardConfig';

function setup() {
  const config = createConfig();
  const store = new SubjectStore(config.analysis);
  const table = new EndpointPolicyTable(config.tiers, config.endpoints);
  const listener = jest.fn();
  const limiter = new RateLimiter(store, table, new AdaptiveThrottle(config.throttle), new SlidingWindowLimiter(), listener);
  return { store, limiter, listener };
}

describe('RateLimiter', () => {
  test('allows a first request and returns the effective policy', () => {
    const { limiter, store } = setup();
    expect(limiter.checkAndRecord('player-1', 'PlaceItem', false, 0)).toEqual({
      allowed: true,
      reason: 'ok',
      policy: { tierName: 'STANDARD', maxRequests: 30, windowSeconds: 60, burstLimit: 5, cooldownSeconds: 0.5 }
    });
    expect(store.has('player-1')).toBe(true);
    expect(limiter.getLimiter().history('player-1', 'PlaceItem')).toEqual([0]);
  });

  test('invalid input is denied without creating state', () => {
    const { limiter, store, listener } = setup();
    expect(limiter.checkAndRecord('', 'PlaceItem', false, 0)).toEqual({
      allowed: false, reason: 'missing subject id', code: 'invalid_input'
    });
    expect(limiter.checkAndRecord('player-1', '  ', false, 0)).toEqual({
      allowed: false, reason: 'missing endpoint name', code: 'invalid_input'
    });
    expect(store.size()).toBe(0);
    expect(listener).not.toHaveBeenCalled();
    expect(limiter.getStats().deniedByCode.invalid_input).toBe(2);
  });

  test('a denial records a violation and notifies the listener', () => {
    const { limiter, store, listener } = setup();
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0);
    const decision = limiter.checkAndRecord('player-1', 'PurchaseItem', false, 1);

    expect(decision.allowed).toBe(false);
    expect(decision.code).toBe('cooldown');
    expect(decision.reason).toBe('cooldown active, retry in 1.00 seconds');

    const record = {
      subjectId: 'player-1',
      endpoint: 'PurchaseItem',
      reason: 'cooldown active, retry in 1.00 seconds',
      code: 'cooldown',
      timestamp: 1
    };
    expect(store.get('player-1')?.violations).toEqual([record]);
    expect(listener).toHaveBeenCalledWith(record, false);
  });

  test('repeated violations tighten the limits for that subject only', () => {
    const { limiter, listener } = setup();
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0);
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0.1);
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0.2);
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0.3);
    expect(listener).toHaveBeenLastCalledWith(expect.objectContaining({ timestamp: 0.3 }), true);

    // Base cooldown is 2s; escalated to 3s.
    const decision = limiter.checkAndRecord('player-1', 'PurchaseItem', false, 2.5);
    expect(decision.allowed).toBe(false);
    expect(decision.reason).toBe('cooldown active, retry in 0.50 seconds');
    expect(decision.policy).toEqual({
      tierName: 'CRITICAL', maxRequests: 3, windowSeconds: 90, burstLimit: 1, cooldownSeconds: 3
    });

    expect(limiter.checkAndRecord('player-2', 'PurchaseItem', false, 2.5).allowed).toBe(true);
  });

  test('privileged subjects get the PRIVILEGED tier', () => {
    const { limiter } = setup();
    expect(limiter.checkAndRecord('mod-1', 'PurchaseItem', true, 0).allowed).toBe(true);
    const second = limiter.checkAndRecord('mod-1', 'PurchaseItem', true, 0.1);
    expect(second.allowed).toBe(true);
    expect(second.policy?.tierName).toBe('PRIVILEGED');
  });

  test('tracks allow and deny counts by code', () => {
    const { limiter } = setup();
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0);
    limiter.checkAndRecord('player-1', 'PurchaseItem', false, 0.5);
    limiter.checkAndRecord('player-1', 'GetInventory', false, 0.5);

    const stats = limiter.getStats();
    expect(stats).toEqual({
      allowed: 2,
      denied: 1,
      deniedByCode: { cooldown: 1, burst: 0, window: 0, invalid_input: 0 }
    });
    stats.allowed = 99;
    expect(limiter.getStats().allowed).toBe(2);

    limiter.resetStats();
    expect(limiter.getStats().allowed).toBe(0);
  });
});
