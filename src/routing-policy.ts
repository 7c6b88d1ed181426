import type { Route53Routing, RoutingPolicy } from './types.js';

export interface ResolvedRouting {
  routing?: Route53Routing;
  multiValueAnswer: boolean;
  setIdentifier?: string;
}

/**
 * Resolve a declared routing policy into the fields attached to a Route 53
 * record set.
 *
 * No policy means simple routing. Multivalue answers only set a flag. The set
 * identifier is passed through untouched; Route 53 itself rejects a non-simple
 * policy that lacks one.
 */
export function resolveRoutingPolicy(
  policy?: RoutingPolicy,
  setIdentifier?: string
): ResolvedRouting {
  const resolved: ResolvedRouting = { multiValueAnswer: false };
  if (setIdentifier) {
    resolved.setIdentifier = setIdentifier;
  }
  if (!policy) {
    return resolved;
  }

  switch (policy.type) {
    case 'weighted':
      resolved.routing = { type: 'weighted', weight: policy.weight };
      break;
    case 'latency':
      resolved.routing = { type: 'latency', region: policy.region };
      break;
    case 'geolocation': {
      const geo: Extract<Route53Routing, { type: 'geolocation' }> = {
        type: 'geolocation',
      };
      if (policy.continent) geo.continent = policy.continent;
      if (policy.country) geo.country = policy.country;
      if (policy.subdivision) geo.subdivision = policy.subdivision;
      resolved.routing = geo;
      break;
    }
    case 'failover':
      resolved.routing = { type: 'failover', role: policy.role };
      break;
    case 'multivalue':
      resolved.multiValueAnswer = true;
      break;
  }

  return resolved;
}
