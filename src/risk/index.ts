import IPCIDR from 'ip-cidr';
import { minimatch } from 'minimatch';
import type { RiskConfig } from '../config/index.js';
import { MAX_COUNTED_FAILURES } from './signals.js';

export { SignalTracker, MAX_COUNTED_FAILURES } from './signals.js';

export interface RiskInput {
  clientIp?: string;
  userAgent?: string;
  endpoint?: string;
  /** Requests counted for the token in the current rate-limit window */
  requestCount: number;
  rateLimit: number;
  /** Failed validations recently seen from the client IP */
  recentFailures: number;
  /** Whether the client IP was seen before for this token */
  knownIp: boolean;
}

export type RiskPolicy = Pick<
  RiskConfig,
  'trusted_networks' | 'sensitive_endpoints' | 'suspicious_user_agents'
>;

export const RISK_WEIGHTS = {
  missingUserAgent: 0.2,
  suspiciousUserAgent: 0.3,
  untrustedNetwork: 0.15,
  newIp: 0.15,
  highRequestRate: 0.2,
  moderateRequestRate: 0.1,
  perRecentFailure: 0.05,
  sensitiveEndpoint: 0.2,
} as const;

function normalizeIp(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.substring(7) : ip;
}

function isInCIDR(ip: string, cidr: string): boolean {
  try {
    const cidrObj = new IPCIDR(cidr);
    return cidrObj.contains(ip);
  } catch {
    return false;
  }
}

export function isTrustedIp(ip: string, trustedNetworks: readonly string[]): boolean {
  const normalized = normalizeIp(ip);
  return trustedNetworks.some((cidr) => isInCIDR(normalized, cidr));
}

export function isSensitiveEndpoint(endpoint: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(endpoint, pattern));
}

/**
 * Score a request between 0 (no concern) and 1. Pure: all history comes in through the
 * input. A high score recommends step-up authentication; it never rejects the request.
 */
export function scoreRisk(input: RiskInput, policy: RiskPolicy): number {
  let score = 0;

  if (!input.userAgent) {
    score += RISK_WEIGHTS.missingUserAgent;
  } else {
    const ua = input.userAgent.toLowerCase();
    if (policy.suspicious_user_agents.some((pattern) => ua.includes(pattern.toLowerCase()))) {
      score += RISK_WEIGHTS.suspiciousUserAgent;
    }
  }

  if (input.clientIp) {
    if (policy.trusted_networks.length > 0 && !isTrustedIp(input.clientIp, policy.trusted_networks)) {
      score += RISK_WEIGHTS.untrustedNetwork;
    }
    if (!input.knownIp) {
      score += RISK_WEIGHTS.newIp;
    }
  }

  if (input.rateLimit > 0) {
    const usage = input.requestCount / input.rateLimit;
    if (usage > 0.8) {
      score += RISK_WEIGHTS.highRequestRate;
    } else if (usage > 0.5) {
      score += RISK_WEIGHTS.moderateRequestRate;
    }
  }

  score += Math.min(input.recentFailures, MAX_COUNTED_FAILURES) * RISK_WEIGHTS.perRecentFailure;

  if (input.endpoint && isSensitiveEndpoint(input.endpoint, policy.sensitive_endpoints)) {
    score += RISK_WEIGHTS.sensitiveEndpoint;
  }

  return Math.round(Math.min(Math.max(score, 0), 1) * 100) / 100;
}
