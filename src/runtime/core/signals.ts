/**
 * Control Flow Outcomes
 *
 * Statement execution returns an outcome instead of throwing. Composite
 * statements stop at the first non-normal outcome and hand it upward; loops
 * consume `break` and `continue`, calls consume `return`.
 */

import type { LoxValue } from './values.js';

export type ExecOutcome =
  | { readonly kind: 'normal' }
  | { readonly kind: 'break' }
  | { readonly kind: 'continue' }
  | { readonly kind: 'return'; readonly value: LoxValue };

export const NORMAL: ExecOutcome = { kind: 'normal' };
export const BREAK: ExecOutcome = { kind: 'break' };
export const CONTINUE: ExecOutcome = { kind: 'continue' };

export function returnOutcome(value: LoxValue): ExecOutcome {
  return { kind: 'return', value };
}
