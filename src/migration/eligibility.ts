import { readNumber, type Payload } from '../lib/payload.js';
import { hasSubscriptionIndicator } from '../transform/field-mapper.js';

export type EligibilityReason = 'has_orders' | 'subscription' | 'revenue';

/**
 * Why a customer is worth migrating. Mirrors the filter the staging store
 * applies when listing eligible customers.
 */
export function eligibilityReasons(customer: Payload, orderCount: number): EligibilityReason[] {
  const reasons: EligibilityReason[] = [];
  if (orderCount > 0) reasons.push('has_orders');
  if (hasSubscriptionIndicator(customer)) reasons.push('subscription');
  if ((readNumber(customer, 'total_revenue') ?? 0) > 0) reasons.push('revenue');
  return reasons;
}

export function isMigrationEligible(customer: Payload, orderCount: number): boolean {
  return eligibilityReasons(customer, orderCount).length > 0;
}
