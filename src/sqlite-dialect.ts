import reservedKeywords from './reserved-keywords.json';
import { MappingError } from './errors';
import type {
  BindValue,
  ColumnDescriptor,
  DefaultValue,
  ForeignKeyAction,
  LogicalType,
  MappingDescriptor,
} from './types';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const RESERVED = new Set(reservedKeywords.map((k) => k.toUpperCase()));

/**
 * Validates an identifier and double-quotes it only when it is an SQLite keyword,
 * so generated SQL stays readable: `Name`, but `"Order"`.
 */
export function escapeIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new MappingError(`Invalid SQL identifier "${name}".`);
  }
  return RESERVED.has(name.toUpperCase()) ? `"${name}"` : name;
}

/** Named placeholder for a column, e.g. `@Name`. */
export function placeholder(column: ColumnDescriptor): string {
  return `@${column.name}`;
}

export const EXPECTED_VERSION_PARAM = '@expectedVersion';
export const PURGE_CUTOFF_PARAM = '@purgeCutoff';

/**
 * Coerces a JavaScript value to something better-sqlite3 can bind.
 */
export function toBindValue(value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  throw new TypeError(`Cannot bind a value of type ${typeof value}.`);
}

export interface ValueConverter {
  toDb(value: unknown): BindValue;
  fromDb(value: unknown): unknown;
}

/**
 * Converts entity property values to their storage form and back, per logical type.
 * Null passes through both directions untouched.
 */
export const VALUE_CONVERTERS: Record<LogicalType, ValueConverter> = {
  text: { toDb: toBindValue, fromDb: (v) => v },
  integer: { toDb: toBindValue, fromDb: (v) => v },
  real: { toDb: toBindValue, fromDb: (v) => v },
  blob: { toDb: toBindValue, fromDb: (v) => v },
  boolean: {
    toDb: (v) => (v === true ? 1 : v === false ? 0 : toBindValue(v)),
    fromDb: (v) => (v === 1 ? true : v === 0 ? false : Boolean(v)),
  },
  datetime: {
    toDb: (v) => (v instanceof Date ? v.toISOString() : toBindValue(v)),
    fromDb: (v) => (typeof v === 'string' ? new Date(v) : v),
  },
  json: {
    toDb: (v) => JSON.stringify(v),
    fromDb: (v): unknown => (typeof v === 'string' ? JSON.parse(v) : v),
  },
};

export function toStorage(column: ColumnDescriptor, value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  return VALUE_CONVERTERS[column.type].toDb(value);
}

export function fromStorage(column: ColumnDescriptor, value: unknown): unknown {
  if (value === null || value === undefined) return null;
  return VALUE_CONVERTERS[column.type].fromDb(value);
}

/** SQL expression comparing a column as a point in time. */
export function datetimeOf(sql: string): string {
  return `datetime(${sql})`;
}

const FK_ACTIONS: Record<ForeignKeyAction, string | undefined> = {
  noAction: undefined,
  restrict: 'RESTRICT',
  cascade: 'CASCADE',
  setNull: 'SET NULL',
  setDefault: 'SET DEFAULT',
};

function renderDefault(value: DefaultValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'object') return `(${value.sql})`;
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'number') return String(value);
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Parameterized statements for one entity. Every statement binds columns as
 * `@ColumnName`; version-checked writes also bind `@expectedVersion`.
 */
export interface DmlTemplates {
  /** Selected column list, in descriptor order. */
  readonly selectList: string;
  /** `Id = @Id` (composite keys joined with AND). */
  readonly keyCondition: string;
  /** `Version = @expectedVersion`, absent when the entity has no version column. */
  readonly versionCondition?: string;
  /** `IsDeleted = 0` for soft-delete entities. */
  readonly liveCondition?: string;
  /** Excludes rows whose `AbsoluteExpiration` has passed. */
  readonly unexpiredCondition?: string;
  /** Rows whose `AbsoluteExpiration` has passed. */
  readonly expiredCondition?: string;
  /** `IsDeleted = 1` for soft-delete entities. */
  readonly deletedCondition?: string;

  readonly insert: string;
  /** Version-checked update that increments the version. */
  readonly update: string;
  /** Version-checked delete; an UPDATE of the delete flag for soft-delete entities. */
  readonly delete: string;
  readonly select: string;
  /** Select by primary key honoring the soft-delete and expiry filters. */
  readonly selectByKey: string;
  /** Reads the stored version (and delete flag) of one key, regardless of filters. */
  readonly versionProbe: string;
  /** Unconditional update by key used for bulk overwrite and reviving soft-deleted rows. */
  readonly overwrite: string;
  readonly purgeExpired?: string;
  readonly purgeDeleted?: string;
}

const templateCache = new WeakMap<MappingDescriptor, DmlTemplates>();

/**
 * Compiles mapping descriptors to SQLite SQL strings.
 * Encapsulates all SQL generation logic.
 */
export class SqliteCompiler {
  /**
   * Table DDL: one definition per column in descriptor order, then the primary key
   * and foreign-key clauses.
   *
   * @example
   * ```sql
   * CREATE TABLE IF NOT EXISTS Items (
   *     Id TEXT NOT NULL,
   *     Name TEXT NOT NULL CHECK (length(Name) <= 100),
   *     Version INTEGER NOT NULL DEFAULT 1,
   *     PRIMARY KEY (Id)
   * );
   * ```
   */
  generateCreateTableSql(descriptor: MappingDescriptor): string {
    const lines = descriptor.columns.map((column) => this.columnDefinition(column));

    if (!descriptor.primaryKey.some((c) => c.autoIncrement)) {
      lines.push(`PRIMARY KEY (${descriptor.primaryKey.map((c) => escapeIdentifier(c.name)).join(', ')})`);
    }

    for (const fk of descriptor.foreignKeys) {
      let clause = fk.name ? `CONSTRAINT ${escapeIdentifier(fk.name)} ` : '';
      clause +=
        `FOREIGN KEY (${fk.columns.map(escapeIdentifier).join(', ')}) ` +
        `REFERENCES ${escapeIdentifier(fk.referencedTable)}(${fk.referencedColumns.map(escapeIdentifier).join(', ')})`;
      const onDelete = FK_ACTIONS[fk.onDelete];
      const onUpdate = FK_ACTIONS[fk.onUpdate];
      if (onDelete) clause += ` ON DELETE ${onDelete}`;
      if (onUpdate) clause += ` ON UPDATE ${onUpdate}`;
      lines.push(clause);
    }

    return (
      `CREATE TABLE IF NOT EXISTS ${escapeIdentifier(descriptor.tableName)} (\n` +
      lines.map((line) => `    ${line}`).join(',\n') +
      `\n);`
    );
  }

  generateCreateIndexSql(descriptor: MappingDescriptor): string[] {
    return descriptor.indexes.map((index) => {
      const columns = index.columns
        .map((c) => `${escapeIdentifier(c.name)}${c.descending ? ' DESC' : ''}`)
        .join(', ');
      const where = index.where ? ` WHERE ${index.where}` : '';
      return (
        `CREATE ${index.unique ? 'UNIQUE ' : ''}INDEX IF NOT EXISTS ${escapeIdentifier(index.name)} ` +
        `ON ${escapeIdentifier(descriptor.tableName)} (${columns})${where};`
      );
    });
  }

  /**
   * Builds (once per descriptor) the parameterized statements used by sessions.
   */
  generateDmlTemplates(descriptor: MappingDescriptor): DmlTemplates {
    const cached = templateCache.get(descriptor);
    if (cached) {
      return cached;
    }
    const templates = Object.freeze(this.compileTemplates(descriptor));
    templateCache.set(descriptor, templates);
    return templates;
  }

  private columnDefinition(column: ColumnDescriptor): string {
    const name = escapeIdentifier(column.name);
    let definition = `${name} ${column.sqlType}`;
    if (column.precision !== undefined) {
      definition += column.scale !== undefined ? `(${column.precision}, ${column.scale})` : `(${column.precision})`;
    }
    if (column.autoIncrement) {
      definition += ' PRIMARY KEY AUTOINCREMENT';
    } else if (!column.nullable) {
      definition += ' NOT NULL';
    }
    if (column.unique) definition += ' UNIQUE';
    if (column.defaultValue !== undefined) definition += ` DEFAULT ${renderDefault(column.defaultValue)}`;
    if (column.size !== undefined && (column.type === 'text' || column.type === 'json')) {
      definition += ` CHECK (length(${name}) <= ${column.size})`;
    }
    return definition;
  }

  private compileTemplates(descriptor: MappingDescriptor): DmlTemplates {
    const table = escapeIdentifier(descriptor.tableName);
    const assign = (c: ColumnDescriptor): string => `${escapeIdentifier(c.name)} = ${placeholder(c)}`;
    const { versionColumn, lastWriteTimeColumn, softDeleteColumn, expirationColumn } = descriptor;

    const selectList = descriptor.columns.map((c) => escapeIdentifier(c.name)).join(', ');
    const keyCondition = descriptor.primaryKey.map(assign).join(' AND ');
    const versionCondition = versionColumn
      ? `${escapeIdentifier(versionColumn.name)} = ${EXPECTED_VERSION_PARAM}`
      : undefined;
    const liveCondition = softDeleteColumn ? `${escapeIdentifier(softDeleteColumn.name)} = 0` : undefined;
    const unexpiredCondition = expirationColumn
      ? `(${escapeIdentifier(expirationColumn.name)} IS NULL OR ${datetimeOf(escapeIdentifier(expirationColumn.name))} > datetime('now'))`
      : undefined;
    const expiredCondition = expirationColumn
      ? `${escapeIdentifier(expirationColumn.name)} IS NOT NULL AND ${datetimeOf(escapeIdentifier(expirationColumn.name))} <= datetime('now')`
      : undefined;
    const deletedCondition = softDeleteColumn ? `${escapeIdentifier(softDeleteColumn.name)} = 1` : undefined;

    const writeConditions = (...extra: (string | undefined)[]): string =>
      [keyCondition, ...extra].filter((c): c is string => c !== undefined).join(' AND ');

    const versionBump = versionColumn
      ? [`${escapeIdentifier(versionColumn.name)} = ${escapeIdentifier(versionColumn.name)} + 1`]
      : [];
    const touch = lastWriteTimeColumn ? [assign(lastWriteTimeColumn)] : [];

    const insertable = descriptor.columns.filter((c) => !c.autoIncrement);
    const insert =
      `INSERT INTO ${table} (${insertable.map((c) => escapeIdentifier(c.name)).join(', ')}) ` +
      `VALUES (${insertable.map(placeholder).join(', ')})`;

    // version, timestamps and the delete flag are maintained by the statements themselves
    const assignable = descriptor.columns.filter(
      (c) => c.primaryKeyOrder === undefined && (c.role === 'data' || c.role === 'expiration'),
    );
    const update =
      `UPDATE ${table} SET ${[...assignable.map(assign), ...versionBump, ...touch].join(', ')} ` +
      `WHERE ${writeConditions(versionCondition, liveCondition)}`;

    const remove = softDeleteColumn
      ? `UPDATE ${table} SET ${[`${escapeIdentifier(softDeleteColumn.name)} = 1`, ...versionBump, ...touch].join(', ')} ` +
        `WHERE ${writeConditions(versionCondition, liveCondition)}`
      : `DELETE FROM ${table} WHERE ${writeConditions(versionCondition)}`;

    const revived = softDeleteColumn ? [`${escapeIdentifier(softDeleteColumn.name)} = 0`] : [];
    const overwrite =
      `UPDATE ${table} SET ${[...assignable.map(assign), ...versionBump, ...touch, ...revived].join(', ')} ` +
      `WHERE ${keyCondition}`;

    const select = `SELECT ${selectList} FROM ${table}`;
    const selectByKey = `${select} WHERE ${writeConditions(liveCondition, unexpiredCondition)}`;

    const probeColumns = [...descriptor.primaryKey, versionColumn, softDeleteColumn]
      .filter((c): c is ColumnDescriptor => c !== undefined)
      .map((c) => escapeIdentifier(c.name));
    const versionProbe = `SELECT ${probeColumns.join(', ')} FROM ${table} WHERE ${keyCondition}`;

    return {
      selectList,
      keyCondition,
      versionCondition,
      liveCondition,
      unexpiredCondition,
      expiredCondition,
      deletedCondition,
      insert,
      update,
      delete: remove,
      select,
      selectByKey,
      versionProbe,
      overwrite,
      purgeExpired: expiredCondition ? `DELETE FROM ${table} WHERE ${expiredCondition}` : undefined,
      purgeDeleted: deletedCondition ? `DELETE FROM ${table} WHERE ${deletedCondition}` : undefined,
    };
  }
}

export const sqliteCompiler = new SqliteCompiler();
