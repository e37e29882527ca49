// ============================================
// NUMERIC POLICY
// ============================================
// JavaScript arithmetic never traps: overflow yields Infinity and invalid
// operations yield NaN. Under 'raise' every checked value must be finite.

import config from './config';
import { NumericFaultError } from './errors';
import { NumericPolicy } from './types';

export function checkFinite(value: number, operation: string, policy: NumericPolicy = config.NUMERIC_POLICY): number {
  if (policy === 'raise' && !Number.isFinite(value)) {
    throw new NumericFaultError(operation, value);
  }
  return value;
}
