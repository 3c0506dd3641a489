/**
 * Composes mapper templates, translated predicates and version checks into
 * executable commands, and interprets the outcome of version-checked writes.
 */

import {
  ConcurrencyConflictError,
  ConfigurationError,
  EntityNotFoundError,
  InvalidKeyError,
  PersistenceError,
} from './errors';
import { translateCount, translatePredicate, translateSelect } from './expression-translator';
import type { Predicate } from './predicate';
import {
  EXPECTED_VERSION_PARAM,
  PURGE_CUTOFF_PARAM,
  datetimeOf,
  escapeIdentifier,
  placeholder,
  sqliteCompiler,
  toStorage,
} from './sqlite-dialect';
import type {
  ColumnDescriptor,
  DefaultValue,
  EntityKey,
  GetOptions,
  MappingDescriptor,
  Parameters,
  Row,
  ScalarValue,
  SelectOptions,
  SqlExpression,
} from './types';

export type CommandKind =
  | 'insert'
  | 'update'
  | 'delete'
  | 'overwrite'
  | 'select'
  | 'count'
  | 'probe'
  | 'purge';

/**
 * One executable statement. Write commands also carry the key they target and
 * the property values to apply to the entity once the write commits.
 */
export interface CommandContext {
  readonly kind: CommandKind;
  readonly descriptor: MappingDescriptor;
  readonly sql: string;
  readonly parameters: Parameters;
  /** Formatted key, for error messages and audit records. */
  readonly entityKey?: string;
  readonly keyParameters?: Parameters;
  readonly expectedVersion?: number;
  readonly changes?: Readonly<Record<string, unknown>>;
}

export interface RunOutcome {
  changes: number;
  lastInsertRowid: number | bigint;
}

/** The slice of the adapter a write command needs. */
export interface CommandExecutor {
  run(sql: string, parameters?: Parameters): RunOutcome;
  get(sql: string, parameters?: Parameters): Row | undefined;
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  );
}

export function readProperty(entity: object, property: string): unknown {
  return Reflect.get(entity, property);
}

/**
 * Extracts the key of an entity: the scalar of a single-column key, or a record
 * keyed by property name for composite keys.
 */
export function keyOf(descriptor: MappingDescriptor, entity: object): EntityKey {
  const values = descriptor.primaryKey.map((column) => {
    const value = readProperty(entity, column.property);
    if (value === undefined || !isScalarValue(value) || value === null) {
      throw new InvalidKeyError(
        `${descriptor.entityName}.${column.property} is part of the primary key and must be set.`,
      );
    }
    return [column.property, value] as const;
  });
  return values.length === 1 ? values[0][1] : Object.fromEntries(values);
}

function isKeyRecord(key: EntityKey): key is Readonly<Record<string, ScalarValue>> {
  return typeof key === 'object' && key !== null && !(key instanceof Date) && !Buffer.isBuffer(key);
}

function keyValue(descriptor: MappingDescriptor, key: EntityKey, column: ColumnDescriptor): ScalarValue {
  const composite = descriptor.primaryKey.length > 1;

  let value: ScalarValue | undefined;
  if (isKeyRecord(key)) {
    value = key[column.property];
  } else if (!composite) {
    value = key;
  }

  if (value === undefined || value === null) {
    throw new InvalidKeyError(
      composite
        ? `${descriptor.entityName} has a composite key; provide { ${descriptor.primaryKey.map((c) => c.property).join(', ')} }.`
        : `${descriptor.entityName}: key value for '${column.property}' is missing.`,
    );
  }
  return value;
}

/** Binds the primary-key columns of `key` as `@Column` parameters. */
export function keyBindings(descriptor: MappingDescriptor, key: EntityKey): Parameters {
  const parameters: Parameters = {};
  for (const column of descriptor.primaryKey) {
    parameters[placeholder(column)] = toStorage(column, keyValue(descriptor, key, column));
  }
  return parameters;
}

/** `42`, or `OrderId=7, Line=2` for composite keys. */
export function formatKey(descriptor: MappingDescriptor, key: EntityKey): string {
  const render = (value: ScalarValue): string =>
    value instanceof Date ? value.toISOString() : Buffer.isBuffer(value) ? value.toString('hex') : String(value);
  if (descriptor.primaryKey.length === 1) {
    return render(keyValue(descriptor, key, descriptor.primaryKey[0]));
  }
  return descriptor.primaryKey
    .map((column) => `${column.property}=${render(keyValue(descriptor, key, column))}`)
    .join(', ');
}

function bindColumns(
  columns: readonly ColumnDescriptor[],
  values: Readonly<Record<string, unknown>>,
  into: Parameters,
): Parameters {
  for (const column of columns) {
    into[placeholder(column)] = toStorage(column, values[column.property]);
  }
  return into;
}

function snapshot(descriptor: MappingDescriptor, entity: object): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const column of descriptor.columns) {
    values[column.property] = readProperty(entity, column.property);
  }
  return values;
}

function assignableColumns(descriptor: MappingDescriptor): ColumnDescriptor[] {
  return descriptor.columns.filter(
    (c) => c.primaryKeyOrder === undefined && (c.role === 'data' || c.role === 'expiration'),
  );
}

function isSqlExpression(value: DefaultValue): value is SqlExpression {
  return typeof value === 'object' && value !== null;
}

/** The version the entity was read at, as stored in its version property. */
export function versionOf(descriptor: MappingDescriptor, entity: object): number | undefined {
  if (!descriptor.versionColumn) return undefined;
  const value = readProperty(entity, descriptor.versionColumn.property);
  if (typeof value === 'bigint') return Number(value);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Insert: version 1, both timestamps set to `now`, not deleted, and a default
 * expiration of `now + afterMs` when the entity configures one.
 */
export function forInsert(descriptor: MappingDescriptor, entity: object, now: Date): CommandContext {
  const changes: Record<string, unknown> = {};
  if (descriptor.versionColumn) changes[descriptor.versionColumn.property] = 1;
  if (descriptor.createdTimeColumn) changes[descriptor.createdTimeColumn.property] = now;
  if (descriptor.lastWriteTimeColumn) changes[descriptor.lastWriteTimeColumn.property] = now;
  if (descriptor.softDeleteColumn) changes[descriptor.softDeleteColumn.property] = false;
  if (descriptor.expirationColumn) {
    const current = readProperty(entity, descriptor.expirationColumn.property);
    if ((current === undefined || current === null) && descriptor.expiresAfterMs !== undefined) {
      changes[descriptor.expirationColumn.property] = new Date(now.getTime() + descriptor.expiresAfterMs);
    }
  }

  const values = { ...snapshot(descriptor, entity), ...changes };
  // unset properties take their column's literal default
  for (const column of descriptor.columns) {
    const fallback = column.defaultValue;
    if (values[column.property] === undefined && fallback !== undefined && !isSqlExpression(fallback)) {
      values[column.property] = fallback;
      changes[column.property] = fallback;
    }
  }
  const templates = sqliteCompiler.generateDmlTemplates(descriptor);
  const autoKey = descriptor.primaryKey.some((c) => c.autoIncrement);

  return {
    kind: 'insert',
    descriptor,
    sql: templates.insert,
    parameters: bindColumns(
      descriptor.columns.filter((c) => !c.autoIncrement),
      values,
      {},
    ),
    entityKey: autoKey ? undefined : formatKey(descriptor, keyOf(descriptor, entity)),
    changes,
  };
}

/**
 * Version-checked update. The row is written only while its stored version still
 * equals `expectedVersion`; the write increments it by one.
 */
export function forUpdate(
  descriptor: MappingDescriptor,
  entity: object,
  expectedVersion: number | undefined,
  now: Date,
): CommandContext {
  const key = keyOf(descriptor, entity);
  const keyParameters = keyBindings(descriptor, key);
  const values = snapshot(descriptor, entity);
  const parameters = bindColumns(assignableColumns(descriptor), values, { ...keyParameters });

  const changes: Record<string, unknown> = {};
  if (descriptor.lastWriteTimeColumn) {
    changes[descriptor.lastWriteTimeColumn.property] = now;
    parameters[placeholder(descriptor.lastWriteTimeColumn)] = toStorage(descriptor.lastWriteTimeColumn, now);
  }

  const expected = resolveExpectedVersion(descriptor, expectedVersion, versionOf(descriptor, entity));
  if (descriptor.versionColumn && expected !== undefined) {
    parameters[EXPECTED_VERSION_PARAM] = expected;
    changes[descriptor.versionColumn.property] = expected + 1;
  }

  return {
    kind: 'update',
    descriptor,
    sql: sqliteCompiler.generateDmlTemplates(descriptor).update,
    parameters,
    entityKey: formatKey(descriptor, key),
    keyParameters,
    expectedVersion: expected,
    changes,
  };
}

/**
 * Version-checked delete; for soft-delete entities an UPDATE that sets the flag
 * and increments the version.
 */
export function forDelete(
  descriptor: MappingDescriptor,
  key: EntityKey,
  expectedVersion: number | undefined,
  now: Date,
): CommandContext {
  const keyParameters = keyBindings(descriptor, key);
  const parameters: Parameters = { ...keyParameters };
  const expected = resolveExpectedVersion(descriptor, expectedVersion, undefined);
  if (descriptor.versionColumn && expected !== undefined) {
    parameters[EXPECTED_VERSION_PARAM] = expected;
  }
  if (descriptor.softDeleteColumn && descriptor.lastWriteTimeColumn) {
    parameters[placeholder(descriptor.lastWriteTimeColumn)] = toStorage(descriptor.lastWriteTimeColumn, now);
  }

  return {
    kind: 'delete',
    descriptor,
    sql: sqliteCompiler.generateDmlTemplates(descriptor).delete,
    parameters,
    entityKey: formatKey(descriptor, key),
    keyParameters,
    expectedVersion: expected,
  };
}

export type PurgeKind = 'expired' | 'deleted' | 'live';

export interface PurgeFilter {
  readonly where?: Predicate | null;
  /** Rows last written at or after this instant are kept. */
  readonly cutoff?: Date;
}

/**
 * Physical DELETE of one kind of row, narrowed by the filter. Undefined when the
 * entity cannot have rows of that kind.
 *
 * @throws ConfigurationError when a cutoff is given for an entity without a last-write time
 */
export function forPurge(
  descriptor: MappingDescriptor,
  kind: PurgeKind,
  filter: PurgeFilter = {},
): CommandContext | undefined {
  const templates = sqliteCompiler.generateDmlTemplates(descriptor);
  const scope =
    kind === 'expired'
      ? [templates.expiredCondition]
      : kind === 'deleted'
        ? [templates.deletedCondition]
        : [templates.liveCondition, templates.unexpiredCondition];
  if (kind !== 'live' && scope[0] === undefined) {
    return undefined;
  }

  const translated = translatePredicate(descriptor, filter.where);
  const parameters: Parameters = { ...translated.parameters };
  const conjuncts = [...scope, translated.sql || undefined];

  if (filter.cutoff !== undefined) {
    const { lastWriteTimeColumn } = descriptor;
    if (!lastWriteTimeColumn) {
      throw new ConfigurationError(`${descriptor.entityName} has no last-write time to purge by age.`);
    }
    conjuncts.push(
      `${datetimeOf(escapeIdentifier(lastWriteTimeColumn.name))} < ${datetimeOf(PURGE_CUTOFF_PARAM)}`,
    );
    parameters[PURGE_CUTOFF_PARAM] = toStorage(lastWriteTimeColumn, filter.cutoff);
  }

  const where = conjuncts.filter((c): c is string => c !== undefined);
  return {
    kind: 'purge',
    descriptor,
    sql: `DELETE FROM ${escapeIdentifier(descriptor.tableName)}${where.length > 0 ? ` WHERE ${where.join(' AND ')}` : ''}`,
    parameters,
  };
}

/**
 * Unconditional update by key: clears the delete flag and increments the version.
 * Used to revive a soft-deleted row on insert and by bulk import overwrites.
 */
export function forOverwrite(
  descriptor: MappingDescriptor,
  entity: object,
  storedVersion: number | undefined,
  now: Date,
): CommandContext {
  const key = keyOf(descriptor, entity);
  const keyParameters = keyBindings(descriptor, key);
  const parameters = bindColumns(assignableColumns(descriptor), snapshot(descriptor, entity), {
    ...keyParameters,
  });

  const changes: Record<string, unknown> = {};
  if (descriptor.lastWriteTimeColumn) {
    changes[descriptor.lastWriteTimeColumn.property] = now;
    parameters[placeholder(descriptor.lastWriteTimeColumn)] = toStorage(descriptor.lastWriteTimeColumn, now);
  }
  if (descriptor.versionColumn && storedVersion !== undefined) {
    changes[descriptor.versionColumn.property] = storedVersion + 1;
  }
  if (descriptor.softDeleteColumn) {
    changes[descriptor.softDeleteColumn.property] = false;
  }

  return {
    kind: 'overwrite',
    descriptor,
    sql: sqliteCompiler.generateDmlTemplates(descriptor).overwrite,
    parameters,
    entityKey: formatKey(descriptor, key),
    keyParameters,
    changes,
  };
}

export function forSelect<T>(
  descriptor: MappingDescriptor,
  predicate: Predicate | undefined,
  options: SelectOptions<T> = {},
): CommandContext {
  const { sql, parameters } = translateSelect(descriptor, predicate, options);
  return { kind: 'select', descriptor, sql, parameters };
}

export function forCount<T>(
  descriptor: MappingDescriptor,
  predicate: Predicate | undefined,
  options: Pick<SelectOptions<T>, 'includeDeleted' | 'includeExpired'> = {},
): CommandContext {
  const { sql, parameters } = translateCount(descriptor, predicate, options);
  return { kind: 'count', descriptor, sql, parameters };
}

export function forSelectByKey(
  descriptor: MappingDescriptor,
  key: EntityKey,
  options: GetOptions = {},
): CommandContext {
  const templates = sqliteCompiler.generateDmlTemplates(descriptor);
  const conjuncts = [
    templates.keyCondition,
    options.includeDeleted ? undefined : templates.liveCondition,
    options.includeExpired ? undefined : templates.unexpiredCondition,
  ].filter((c): c is string => c !== undefined);
  const keyParameters = keyBindings(descriptor, key);

  return {
    kind: 'select',
    descriptor,
    sql: `${templates.select} WHERE ${conjuncts.join(' AND ')}`,
    parameters: keyParameters,
    entityKey: formatKey(descriptor, key),
    keyParameters,
  };
}

export function forVersionProbe(descriptor: MappingDescriptor, key: EntityKey): CommandContext {
  const keyParameters = keyBindings(descriptor, key);
  return {
    kind: 'probe',
    descriptor,
    sql: sqliteCompiler.generateDmlTemplates(descriptor).versionProbe,
    parameters: keyParameters,
    entityKey: formatKey(descriptor, key),
    keyParameters,
  };
}

function resolveExpectedVersion(
  descriptor: MappingDescriptor,
  explicit: number | undefined,
  fromEntity: number | undefined,
): number | undefined {
  const expected = explicit ?? fromEntity;
  if (expected !== undefined && (!Number.isSafeInteger(expected) || expected < 1)) {
    throw new InvalidKeyError(`${descriptor.entityName}: expected version must be a positive integer, got ${expected}.`);
  }
  return expected;
}

/** Result of reading a row's version and delete flag. */
export interface StoredVersion {
  version: number | undefined;
  deleted: boolean;
}

export function readStoredVersion(descriptor: MappingDescriptor, row: Row): StoredVersion {
  const raw = descriptor.versionColumn ? row[descriptor.versionColumn.name] : undefined;
  const version = typeof raw === 'bigint' ? Number(raw) : typeof raw === 'number' ? raw : undefined;
  const flag = descriptor.softDeleteColumn ? row[descriptor.softDeleteColumn.name] : 0;
  return { version, deleted: flag === 1 || flag === 1n };
}

export type WriteState = 'building' | 'executing' | 'committed' | 'conflict' | 'notFound' | 'faulted';

/**
 * A single write: `building → executing → committed | conflict | notFound | faulted`.
 * Terminal states are final; a logical retry needs a new command.
 */
export class WriteCommand {
  private current: WriteState = 'building';

  constructor(readonly context: CommandContext) {}

  get state(): WriteState {
    return this.current;
  }

  /**
   * Runs the statement. A zero row count on a keyed write is resolved by probing
   * the row through the same executor, so the probe sees the same transaction.
   *
   * @throws EntityNotFoundError when the row is missing or soft-deleted
   * @throws ConcurrencyConflictError when the row exists at another version
   */
  execute(executor: CommandExecutor): RunOutcome {
    if (this.current !== 'building') {
      throw new PersistenceError(`Write command has already run (state: ${this.current}).`);
    }
    this.current = 'executing';

    let outcome: RunOutcome;
    try {
      outcome = executor.run(this.context.sql, this.context.parameters);
    } catch (error) {
      this.current = 'faulted';
      throw error;
    }

    if (outcome.changes > 0) {
      this.current = 'committed';
      return outcome;
    }

    const { descriptor, keyParameters, entityKey = '?' } = this.context;
    if (!keyParameters) {
      this.current = 'faulted';
      throw new PersistenceError(`${descriptor.entityName}: ${this.context.kind} affected no rows.`);
    }

    let probe: Row | undefined;
    try {
      probe = executor.get(sqliteCompiler.generateDmlTemplates(descriptor).versionProbe, keyParameters);
    } catch (error) {
      this.current = 'faulted';
      throw error;
    }

    const stored = probe ? readStoredVersion(descriptor, probe) : undefined;
    if (!stored || stored.deleted || stored.version === undefined || this.context.expectedVersion === undefined) {
      this.current = 'notFound';
      throw new EntityNotFoundError(entityKey);
    }

    this.current = 'conflict';
    throw new ConcurrencyConflictError(entityKey, stored.version, this.context.expectedVersion);
  }
}

/** Copies committed property values onto the entity. */
export function applyChanges(entity: object, context: CommandContext): void {
  for (const [property, value] of Object.entries(context.changes ?? {})) {
    Reflect.set(entity, property, value);
  }
}
