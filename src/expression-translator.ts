/**
 * Translates predicate trees and ordering specifications into parameterized SQL.
 *
 * Translation is pure and deterministic: the same tree over the same descriptor
 * always yields the same text, and literals become `@p0`, `@p1`, ... in
 * left-to-right walk order, one parameter per literal occurrence.
 */

import { UnsupportedExpressionError } from './errors';
import type { Operand, Predicate } from './predicate';
import {
  datetimeOf,
  escapeIdentifier,
  sqliteCompiler,
  toBindValue,
  toStorage,
} from './sqlite-dialect';
import type {
  BindValue,
  ColumnDescriptor,
  MappingDescriptor,
  OrderSpec,
  Parameters,
  ScalarValue,
  SelectOptions,
} from './types';

export interface TranslatedSql {
  sql: string;
  parameters: Parameters;
}

const OPERATORS = {
  eq: '=',
  ne: '<>',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
} as const;

function kindOf(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'kind' in node) {
    return String(node.kind);
  }
  return typeof node;
}

class Translation {
  readonly parameters: Parameters = {};
  private next = 0;

  constructor(private readonly descriptor: MappingDescriptor) {}

  bind(value: BindValue): string {
    const name = `@p${this.next++}`;
    this.parameters[name] = value;
    return name;
  }

  column(property: string, nodeKind: string): ColumnDescriptor {
    const column = this.descriptor.columns.find((c) => c.property === property);
    if (!column) {
      throw new UnsupportedExpressionError(
        nodeKind,
        `'${property}' is not a mapped property of ${this.descriptor.entityName}`,
      );
    }
    return column;
  }

  /** Converts a literal to its storage form using the column it is compared with. */
  storageValue(value: ScalarValue, against: ColumnDescriptor | undefined): BindValue {
    return against ? toStorage(against, value) : toBindValue(value);
  }

  predicate(node: Predicate): string {
    switch (node.kind) {
      case 'compare':
        return this.compare(node.op, node.left, node.right);

      case 'and':
      case 'or': {
        if (node.operands.length === 0) {
          throw new UnsupportedExpressionError(node.kind, 'requires at least one operand');
        }
        if (node.operands.length === 1) {
          return this.predicate(node.operands[0]);
        }
        const glue = node.kind === 'and' ? ' AND ' : ' OR ';
        return `(${node.operands.map((operand) => this.predicate(operand)).join(glue)})`;
      }

      case 'not':
        return `(NOT ${this.predicate(node.operand)})`;

      case 'stringMatch': {
        const column = this.column(node.field.name, node.kind);
        if (column.type !== 'text') {
          throw new UnsupportedExpressionError(node.kind, `'${column.property}' is not a text column`);
        }
        const pattern =
          node.mode === 'contains'
            ? `%${node.value}%`
            : node.mode === 'startsWith'
              ? `${node.value}%`
              : `%${node.value}`;
        return `(${escapeIdentifier(column.name)} LIKE ${this.bind(pattern)})`;
      }

      case 'isNull': {
        const column = this.column(node.field.name, node.kind);
        return `(${escapeIdentifier(column.name)} IS ${node.negated ? 'NOT ' : ''}NULL)`;
      }

      case 'in': {
        const column = this.column(node.field.name, node.kind);
        if (node.values.length === 0) {
          throw new UnsupportedExpressionError(node.kind, 'requires at least one value');
        }
        if (node.values.some((v) => v === null)) {
          throw new UnsupportedExpressionError(node.kind, 'null never matches IN; use isNull');
        }
        const asTime = column.type === 'datetime';
        const target = asTime
          ? datetimeOf(escapeIdentifier(column.name))
          : escapeIdentifier(column.name);
        const placeholders = node.values.map((v) => {
          const name = this.bind(this.storageValue(v, column));
          return asTime ? datetimeOf(name) : name;
        });
        return `(${target} IN (${placeholders.join(', ')}))`;
      }

      default:
        throw new UnsupportedExpressionError(kindOf(node));
    }
  }

  private compare(op: keyof typeof OPERATORS, left: Operand, right: Operand): string {
    if (!Object.hasOwn(OPERATORS, op)) {
      throw new UnsupportedExpressionError('compare', `unknown operator '${String(op)}'`);
    }

    const leftColumn = left.kind === 'field' ? this.column(left.name, 'compare') : undefined;
    const rightColumn = right.kind === 'field' ? this.column(right.name, 'compare') : undefined;

    const nullSide =
      left.kind === 'literal' && left.value === null
        ? 'left'
        : right.kind === 'literal' && right.value === null
          ? 'right'
          : undefined;
    if (nullSide) {
      if (op !== 'eq' && op !== 'ne') {
        throw new UnsupportedExpressionError('compare', `'${op}' cannot compare with null`);
      }
      const other = nullSide === 'left' ? right : left;
      const otherColumn = nullSide === 'left' ? rightColumn : leftColumn;
      if (other.kind === 'literal' && other.value === null) {
        throw new UnsupportedExpressionError('compare', 'both operands are null');
      }
      const operand =
        otherColumn !== undefined
          ? escapeIdentifier(otherColumn.name)
          : this.operand(other, undefined, false);
      return `(${operand} IS ${op === 'ne' ? 'NOT ' : ''}NULL)`;
    }

    const asTime = leftColumn?.type === 'datetime' || rightColumn?.type === 'datetime';
    const lhs = this.operand(left, rightColumn, asTime);
    const rhs = this.operand(right, leftColumn, asTime);
    return `(${lhs} ${OPERATORS[op]} ${rhs})`;
  }

  private operand(operand: Operand, against: ColumnDescriptor | undefined, asTime: boolean): string {
    const sql =
      operand.kind === 'field'
        ? escapeIdentifier(this.column(operand.name, 'compare').name)
        : this.bind(this.storageValue(operand.value, against));
    return asTime ? datetimeOf(sql) : sql;
  }
}

/**
 * Translates a predicate into a WHERE fragment (without the `WHERE` keyword).
 * An absent (undefined or null) predicate means "no filter" and yields an empty fragment.
 *
 * @throws UnsupportedExpressionError naming the node kind that has no SQL form
 */
export function translatePredicate(
  descriptor: MappingDescriptor,
  predicate: Predicate | null | undefined,
): TranslatedSql {
  if (predicate === undefined || predicate === null) {
    return { sql: '', parameters: {} };
  }
  const translation = new Translation(descriptor);
  const sql = translation.predicate(predicate);
  return { sql, parameters: translation.parameters };
}

/**
 * `ORDER BY Name ASC, Value DESC`, or `''` when there is nothing to order by.
 */
export function translateOrderBy<T>(
  descriptor: MappingDescriptor,
  spec: OrderSpec<T> | undefined,
): string {
  if (!spec || spec.keys.length === 0) {
    return '';
  }
  const keys = spec.keys.map((key) => {
    const column = descriptor.columns.find((c) => c.property === key.field);
    if (!column) {
      throw new UnsupportedExpressionError(
        'orderBy',
        `'${key.field}' is not a mapped property of ${descriptor.entityName}`,
      );
    }
    if (key.direction !== 'ASC' && key.direction !== 'DESC') {
      throw new UnsupportedExpressionError('orderBy', `unknown direction '${String(key.direction)}'`);
    }
    return `${escapeIdentifier(column.name)} ${key.direction}`;
  });
  return `ORDER BY ${keys.join(', ')}`;
}

function assertCount(label: 'limit' | 'offset', value: number | undefined): void {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
    throw new UnsupportedExpressionError(label, `must be a non-negative integer, got ${value}`);
  }
}

function whereClause<T>(
  descriptor: MappingDescriptor,
  predicate: Predicate | undefined,
  options: SelectOptions<T>,
): TranslatedSql {
  const templates = sqliteCompiler.generateDmlTemplates(descriptor);
  const translated = translatePredicate(descriptor, predicate);

  const conjuncts = [
    translated.sql || undefined,
    options.includeDeleted ? undefined : templates.liveCondition,
    options.includeExpired ? undefined : templates.unexpiredCondition,
  ].filter((c): c is string => c !== undefined);

  return {
    sql: conjuncts.length > 0 ? ` WHERE ${conjuncts.join(' AND ')}` : '',
    parameters: translated.parameters,
  };
}

/**
 * Composes a complete SELECT: columns, WHERE (predicate then the soft-delete and
 * expiry filters), ORDER BY, LIMIT/OFFSET.
 *
 * @example
 * ```typescript
 * const p = predicateBuilder<Item>();
 * translateSelect(descriptor, p.eq('name', 'John Doe'), { orderBy: orderBy<Item>('name'), limit: 10 });
 * // SELECT Id, Name, ... FROM Items WHERE (Name = @p0) ORDER BY Name ASC LIMIT 10
 * ```
 */
export function translateSelect<T>(
  descriptor: MappingDescriptor,
  predicate: Predicate | undefined,
  options: SelectOptions<T> = {},
): TranslatedSql {
  assertCount('limit', options.limit);
  assertCount('offset', options.offset);

  const templates = sqliteCompiler.generateDmlTemplates(descriptor);
  const where = whereClause(descriptor, predicate, options);
  let sql = `${templates.select}${where.sql}`;

  const order = translateOrderBy(descriptor, options.orderBy);
  if (order) {
    sql += ` ${order}`;
  }

  if (options.limit !== undefined) {
    sql += ` LIMIT ${options.limit}`;
  } else if (options.offset !== undefined) {
    sql += ' LIMIT -1';
  }
  if (options.offset !== undefined) {
    sql += ` OFFSET ${options.offset}`;
  }

  return { sql, parameters: where.parameters };
}

export function translateCount<T>(
  descriptor: MappingDescriptor,
  predicate: Predicate | undefined,
  options: Pick<SelectOptions<T>, 'includeDeleted' | 'includeExpired'> = {},
): TranslatedSql {
  const where = whereClause(descriptor, predicate, options);
  return {
    sql: `SELECT COUNT(*) AS count FROM ${escapeIdentifier(descriptor.tableName)}${where.sql}`,
    parameters: where.parameters,
  };
}
