import { EndpointPolicy, EndpointTier, TierLimits, TierName } from '../types';
import { DEFAULT_ENDPOINT_TIER } from '../config/constants';

/**
 * Static endpoint → limit tier mapping.
 * Built once at startup; policies are frozen and shared by every subject.
 */
export class EndpointPolicyTable {
  private policies: Record<TierName, EndpointPolicy>;
  private endpoints: Map<string, EndpointTier> = new Map();

  constructor(tiers: Record<TierName, TierLimits>, endpoints: Record<string, EndpointTier>) {
    const build = (name: TierName): EndpointPolicy => {
      const limits = tiers[name];
      if (!limits) {
        throw new Error(`No limits configured for tier ${name}`);
      }
      return Object.freeze({ tierName: name, ...limits });
    };
    this.policies = {
      CRITICAL: build('CRITICAL'),
      STANDARD: build('STANDARD'),
      HIGH_FREQUENCY: build('HIGH_FREQUENCY'),
      PRIVILEGED: build('PRIVILEGED')
    };
    for (const [endpoint, tier] of Object.entries(endpoints)) {
      this.endpoints.set(endpoint, tier);
    }
  }

  /**
   * Policy for an endpoint. Privileged subjects always get the PRIVILEGED tier;
   * unknown endpoints fall back to STANDARD.
   */
  resolve(endpoint: string, isPrivileged: boolean): EndpointPolicy {
    if (isPrivileged) return this.tier('PRIVILEGED');
    return this.tier(this.tierOf(endpoint));
  }

  tierOf(endpoint: string): EndpointTier {
    return this.endpoints.get(endpoint) ?? DEFAULT_ENDPOINT_TIER;
  }

  tier(name: TierName): EndpointPolicy {
    return this.policies[name];
  }

  has(endpoint: string): boolean {
    return this.endpoints.has(endpoint);
  }

  listEndpoints(): Array<{ endpoint: string; tier: EndpointTier }> {
    return Array.from(this.endpoints.entries()).map(([endpoint, tier]) => ({ endpoint, tier }));
  }

  /** Longest configured window, for pruning request history. */
  maxWindowSeconds(): number {
    let max = 0;
    for (const p of Object.values(this.policies)) max = Math.max(max, p.windowSeconds);
    return max;
  }
}
