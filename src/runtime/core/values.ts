/**
 * Runtime Values
 *
 * Value model, truthiness, equality and display formatting.
 */

import type { LoxCallable, LoxClass } from './callable.js';

/** An object created by calling a class. Fields are per-instance. */
export interface LoxInstance {
  readonly __type: 'instance';
  readonly klass: LoxClass;
  readonly fields: Map<string, LoxValue>;
}

/** Any value a program can produce. `null` is nil. */
export type LoxValue =
  | null
  | boolean
  | number
  | string
  | LoxCallable
  | LoxInstance;

/** Names reported by the `type` native */
export type LoxTypeName =
  | 'nil'
  | 'bool'
  | 'number'
  | 'string'
  | 'fn'
  | 'class'
  | 'instance';

export function isInstance(value: LoxValue): value is LoxInstance {
  return (
    typeof value === 'object' && value !== null && value.__type === 'instance'
  );
}

/** Only nil and false are falsy */
export function isTruthy(value: LoxValue): boolean {
  return value !== null && value !== false;
}

/**
 * Equality without coercion: values of different kinds are never equal,
 * numbers follow IEEE comparison (NaN != NaN), objects compare by identity.
 */
export function isEqual(a: LoxValue, b: LoxValue): boolean {
  return a === b;
}

export function typeName(value: LoxValue): LoxTypeName {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (isInstance(value)) return 'instance';
  return value.kind === 'class' ? 'class' : 'fn';
}

/** Display text used by `print` and the interactive echo */
export function formatValue(value: LoxValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  // Integral numbers print without a fractional part
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return value;
  if (isInstance(value)) return `${value.klass.name} instance`;
  switch (value.kind) {
    case 'function':
    case 'bound':
      return `<fn ${value.name}>`;
    case 'native':
      return `<native fn ${value.name}>`;
    case 'class':
      return value.name;
  }
}
