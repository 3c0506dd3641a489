/**
 * Predicate trees and ordering specifications.
 *
 * A predicate is a closed union of node kinds; the translator matches over every
 * kind, so a tree built from these types always has a known SQL form. Field
 * operands name entity *properties*, which the translator resolves to columns.
 */

import type { OrderKey, OrderSpec, ScalarValue } from './types';

export type FieldName<T> = Extract<keyof T, string>;

/** Values a property of `T[K]` may be compared against. */
export type FieldValue<T, K extends keyof T> = (NonNullable<T[K]> & ScalarValue) | null;

export type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';
export type StringMatchMode = 'contains' | 'startsWith' | 'endsWith';

export interface FieldOperand {
  readonly kind: 'field';
  readonly name: string;
}

export interface LiteralOperand {
  readonly kind: 'literal';
  readonly value: ScalarValue;
}

export type Operand = FieldOperand | LiteralOperand;

export interface CompareNode {
  readonly kind: 'compare';
  readonly op: ComparisonOperator;
  readonly left: Operand;
  readonly right: Operand;
}

export interface AndNode {
  readonly kind: 'and';
  readonly operands: readonly Predicate[];
}

export interface OrNode {
  readonly kind: 'or';
  readonly operands: readonly Predicate[];
}

export interface NotNode {
  readonly kind: 'not';
  readonly operand: Predicate;
}

export interface StringMatchNode {
  readonly kind: 'stringMatch';
  readonly mode: StringMatchMode;
  readonly field: FieldOperand;
  readonly value: string;
}

export interface IsNullNode {
  readonly kind: 'isNull';
  readonly field: FieldOperand;
  readonly negated: boolean;
}

export interface InNode {
  readonly kind: 'in';
  readonly field: FieldOperand;
  readonly values: readonly ScalarValue[];
}

export type Predicate =
  | CompareNode
  | AndNode
  | OrNode
  | NotNode
  | StringMatchNode
  | IsNullNode
  | InNode;

export function field(name: string): FieldOperand {
  return { kind: 'field', name };
}

export function literal(value: ScalarValue): LiteralOperand {
  return { kind: 'literal', value };
}

export interface PredicateBuilder<T> {
  eq<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  ne<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  lt<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  le<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  gt<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  ge<K extends FieldName<T>>(name: K, value: FieldValue<T, K>): Predicate;
  /** Field-to-field comparison, e.g. `compareFields('updatedAt', 'gt', 'createdAt')`. */
  compareFields(left: FieldName<T>, op: ComparisonOperator, right: FieldName<T>): Predicate;
  contains(name: FieldName<T>, value: string): Predicate;
  startsWith(name: FieldName<T>, value: string): Predicate;
  endsWith(name: FieldName<T>, value: string): Predicate;
  isNull(name: FieldName<T>): Predicate;
  isNotNull(name: FieldName<T>): Predicate;
  in<K extends FieldName<T>>(name: K, values: readonly FieldValue<T, K>[]): Predicate;
  and(...operands: Predicate[]): Predicate;
  or(...operands: Predicate[]): Predicate;
  not(operand: Predicate): Predicate;
}

/**
 * Typed predicate construction: field names are checked against the entity's
 * properties and values against the property types.
 *
 * @example
 * ```typescript
 * const p = predicateBuilder<Item>();
 * const filter = p.and(p.contains('name', 'Smith'), p.gt('value', 10));
 * ```
 */
export function predicateBuilder<T>(): PredicateBuilder<T> {
  const compare =
    (op: ComparisonOperator) =>
    (name: string, value: ScalarValue): Predicate => ({
      kind: 'compare',
      op,
      left: field(name),
      right: literal(value),
    });
  const match =
    (mode: StringMatchMode) =>
    (name: string, value: string): Predicate => ({
      kind: 'stringMatch',
      mode,
      field: field(name),
      value,
    });

  return {
    eq: compare('eq'),
    ne: compare('ne'),
    lt: compare('lt'),
    le: compare('le'),
    gt: compare('gt'),
    ge: compare('ge'),
    compareFields: (left, op, right) => ({ kind: 'compare', op, left: field(left), right: field(right) }),
    contains: match('contains'),
    startsWith: match('startsWith'),
    endsWith: match('endsWith'),
    isNull: (name) => ({ kind: 'isNull', field: field(name), negated: false }),
    isNotNull: (name) => ({ kind: 'isNull', field: field(name), negated: true }),
    in: (name, values) => ({ kind: 'in', field: field(name), values: [...values] }),
    and: (...operands) => ({ kind: 'and', operands }),
    or: (...operands) => ({ kind: 'or', operands }),
    not: (operand) => ({ kind: 'not', operand }),
  };
}

/**
 * An immutable ordering specification; each `thenBy` returns a new builder.
 */
export class OrderByBuilder<T> implements OrderSpec<T> {
  constructor(readonly keys: readonly OrderKey<T>[]) {}

  thenBy(name: FieldName<T>): OrderByBuilder<T> {
    return new OrderByBuilder([...this.keys, { field: name, direction: 'ASC' }]);
  }

  thenByDescending(name: FieldName<T>): OrderByBuilder<T> {
    return new OrderByBuilder([...this.keys, { field: name, direction: 'DESC' }]);
  }
}

export function orderBy<T>(name: FieldName<T>): OrderByBuilder<T> {
  return new OrderByBuilder<T>([{ field: name, direction: 'ASC' }]);
}

export function orderByDescending<T>(name: FieldName<T>): OrderByBuilder<T> {
  return new OrderByBuilder<T>([{ field: name, direction: 'DESC' }]);
}
