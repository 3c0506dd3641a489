/**
 * Builds the mapping descriptor of an entity class from its decorator metadata.
 *
 * Descriptors are built once per class and kept for the life of the process in an
 * append-only cache. Changing decorators therefore requires a restart.
 */

import { MappingError } from './errors';
import { getClassHierarchyMetadata, getTableMetadata } from './decorators';
import {
  TYPE_MAP,
  ColumnDescriptor,
  ColumnMetadata,
  ForeignKeyDescriptor,
  ForeignKeyMetadata,
  IndexDescriptor,
  IndexMetadata,
  LogicalType,
  MappingDescriptor,
  TableMetadata,
} from './types';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Statement parameters that are not columns; a column of the same name would shadow them. */
const RESERVED_PARAMETERS = new Set(['expectedversion', 'purgecutoff']);

export const SOFT_DELETE_COLUMN = 'IsDeleted';
export const EXPIRATION_COLUMN = 'AbsoluteExpiration';

const descriptors = new Map<Function, MappingDescriptor>();

/**
 * Returns the mapping descriptor for an entity class, building and caching it on
 * first use.
 *
 * @throws MappingError when the metadata is missing or contradictory
 */
export function buildMapping(entity: Function): MappingDescriptor {
  const cached = descriptors.get(entity);
  if (cached) {
    return cached;
  }

  const built = deepFreeze(createDescriptor(entity));
  // insert-if-absent: the first descriptor stored for a class is the only one ever handed out
  if (!descriptors.has(entity)) {
    descriptors.set(entity, built);
  }
  return descriptors.get(entity) ?? built;
}

export function isMappingCached(entity: Function): boolean {
  return descriptors.has(entity);
}

function createDescriptor(entity: Function): MappingDescriptor {
  const table = getTableMetadata(entity);
  if (!table) {
    throw new MappingError(`Entity ${entity.name} is missing the @Entity decorator.`);
  }

  const chain = getClassHierarchyMetadata(entity);
  const notMapped = new Set(chain.flatMap((c) => c.notMapped));

  const declared = collectColumns(chain.map((c) => c.columns), notMapped);
  const columns = declared.map(({ metadata }, position) =>
    describeColumn(entity, metadata, position),
  );
  appendCapabilityColumns(columns, table);
  assertUniqueColumnNames(entity, columns);

  const primaryKey = resolvePrimaryKey(entity, columns);
  const expiresAfterMs = resolveExpirySpan(entity, table);

  return {
    entity,
    entityName: entity.name,
    tableName: table.name,
    columns,
    primaryKey,
    versionColumn: singleRole(entity, columns, 'version'),
    createdTimeColumn: singleRole(entity, columns, 'createdTime'),
    lastWriteTimeColumn: singleRole(entity, columns, 'lastWriteTime'),
    softDeleteColumn: singleRole(entity, columns, 'softDelete'),
    expirationColumn: singleRole(entity, columns, 'expiration'),
    softDelete: table.options.softDelete === true,
    expiry: table.options.expiry !== undefined && table.options.expiry !== false,
    expiresAfterMs,
    auditTrail: table.options.auditTrail === true,
    lists: resolveListSupport(entity, table, primaryKey),
    indexes: resolveIndexes(
      entity,
      chain.flatMap((c) => c.indexes),
      columns,
      notMapped,
    ),
    foreignKeys: resolveForeignKeys(
      entity,
      table,
      chain.flatMap((c) => c.foreignKeys),
      columns,
      notMapped,
    ),
  };
}

/**
 * Leaf-class columns come first, then inherited ones. A property redeclared by a
 * subclass keeps the subclass definition.
 */
function collectColumns(
  levels: readonly (readonly ColumnMetadata[])[],
  notMapped: ReadonlySet<string>,
): { metadata: ColumnMetadata }[] {
  const seen = new Set<string>();
  const result: { metadata: ColumnMetadata }[] = [];
  for (const level of levels) {
    for (const metadata of level) {
      if (seen.has(metadata.property)) continue;
      seen.add(metadata.property);
      if (!notMapped.has(metadata.property)) {
        result.push({ metadata });
      }
    }
  }
  return result;
}

function inferType(entity: Function, metadata: ColumnMetadata): LogicalType {
  if (metadata.options.type) {
    return metadata.options.type;
  }
  switch (metadata.designType) {
    case String:
      return 'text';
    case Number:
      return 'integer';
    case Boolean:
      return 'boolean';
    case Date:
      return 'datetime';
    case Buffer:
      return 'blob';
    case Object:
    case Array:
      return 'json';
    default:
      throw new MappingError(
        `${entity.name}.${metadata.property}: cannot infer the column type. Declare 'type' or enable emitDecoratorMetadata.`,
      );
  }
}

function describeColumn(
  entity: Function,
  metadata: ColumnMetadata,
  position: number,
): ColumnDescriptor {
  const { options } = metadata;
  const name = options.name ?? metadata.property;
  if (!IDENTIFIER.test(name)) {
    throw new MappingError(`${entity.name}.${metadata.property}: invalid column name "${name}".`);
  }
  if (RESERVED_PARAMETERS.has(name.toLowerCase())) {
    throw new MappingError(`${entity.name}.${metadata.property}: column name "${name}" is reserved.`);
  }

  const type = inferType(entity, metadata);
  if (metadata.role === 'version' && type !== 'integer') {
    throw new MappingError(`${entity.name}.${metadata.property}: the version column must be an integer.`);
  }

  const autoIncrement = metadata.primary && options.autoIncrement === true;
  if (options.autoIncrement && !metadata.primary) {
    throw new MappingError(`${entity.name}.${metadata.property}: only primary-key columns can auto-increment.`);
  }
  if (autoIncrement && type !== 'integer') {
    throw new MappingError(`${entity.name}.${metadata.property}: auto-increment requires an integer column.`);
  }

  for (const [label, value] of [
    ['size', options.size],
    ['precision', options.precision],
    ['scale', options.scale],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new MappingError(`${entity.name}.${metadata.property}: ${label} must be a non-negative integer.`);
    }
  }

  return {
    property: metadata.property,
    name,
    type,
    sqlType: TYPE_MAP[type],
    nullable: metadata.primary ? false : options.nullable === true,
    unique: options.unique === true,
    size: options.size,
    precision: options.precision,
    scale: options.scale,
    defaultValue: options.default,
    autoIncrement,
    primaryKeyOrder: metadata.primary ? (options.order ?? position + 1) : undefined,
    role: metadata.role,
  };
}

function appendCapabilityColumns(columns: ColumnDescriptor[], table: TableMetadata): void {
  const claim = (name: string, synthesized: ColumnDescriptor): void => {
    const index = columns.findIndex((c) => c.name.toLowerCase() === name.toLowerCase());
    if (index >= 0) {
      columns[index] = { ...columns[index], role: synthesized.role };
    } else {
      columns.push(synthesized);
    }
  };

  if (table.options.softDelete) {
    claim(SOFT_DELETE_COLUMN, {
      property: 'isDeleted',
      name: SOFT_DELETE_COLUMN,
      type: 'boolean',
      sqlType: TYPE_MAP.boolean,
      nullable: false,
      unique: false,
      defaultValue: false,
      autoIncrement: false,
      role: 'softDelete',
    });
  }

  if (table.options.expiry) {
    claim(EXPIRATION_COLUMN, {
      property: 'absoluteExpiration',
      name: EXPIRATION_COLUMN,
      type: 'datetime',
      sqlType: TYPE_MAP.datetime,
      nullable: true,
      unique: false,
      autoIncrement: false,
      role: 'expiration',
    });
  }
}

function assertUniqueColumnNames(entity: Function, columns: readonly ColumnDescriptor[]): void {
  const seen = new Map<string, string>();
  for (const column of columns) {
    const key = column.name.toLowerCase();
    const owner = seen.get(key);
    if (owner !== undefined) {
      throw new MappingError(
        `${entity.name}: column "${column.name}" is mapped by both '${owner}' and '${column.property}'.`,
      );
    }
    seen.set(key, column.property);
  }
}

function resolvePrimaryKey(
  entity: Function,
  columns: readonly ColumnDescriptor[],
): ColumnDescriptor[] {
  const keyColumns = columns
    .filter((c) => c.primaryKeyOrder !== undefined)
    .sort((a, b) => (a.primaryKeyOrder ?? 0) - (b.primaryKeyOrder ?? 0));

  if (keyColumns.length === 0) {
    throw new MappingError(`${entity.name} declares no primary key. Mark a column with @PrimaryColumn.`);
  }

  const orders = new Set(keyColumns.map((c) => c.primaryKeyOrder));
  if (orders.size !== keyColumns.length) {
    throw new MappingError(`${entity.name}: primary-key columns share the same order.`);
  }

  if (keyColumns.length > 1 && keyColumns.some((c) => c.autoIncrement)) {
    throw new MappingError(`${entity.name}: a composite primary key cannot auto-increment.`);
  }

  return keyColumns;
}

/** List entries store the entity key as text, so lists need a single text or integer key. */
function resolveListSupport(
  entity: Function,
  table: TableMetadata,
  primaryKey: readonly ColumnDescriptor[],
): boolean {
  if (table.options.lists !== true) {
    return false;
  }
  const [first] = primaryKey;
  if (primaryKey.length !== 1 || (first.type !== 'text' && first.type !== 'integer')) {
    throw new MappingError(`${entity.name}: lists need a single text or integer primary key.`);
  }
  return true;
}

function singleRole(
  entity: Function,
  columns: readonly ColumnDescriptor[],
  role: ColumnDescriptor['role'],
): ColumnDescriptor | undefined {
  const matches = columns.filter((c) => c.role === role);
  if (matches.length > 1) {
    throw new MappingError(`${entity.name} maps more than one ${role} column.`);
  }
  return matches[0];
}

function resolveExpirySpan(entity: Function, table: TableMetadata): number | undefined {
  const expiry = table.options.expiry;
  if (typeof expiry !== 'object') {
    return undefined;
  }
  if (!Number.isFinite(expiry.afterMs) || expiry.afterMs <= 0) {
    throw new MappingError(`${entity.name}: expiry.afterMs must be a positive number of milliseconds.`);
  }
  return expiry.afterMs;
}

function columnFor(
  entity: Function,
  columns: readonly ColumnDescriptor[],
  notMapped: ReadonlySet<string>,
  property: string,
  usage: string,
): ColumnDescriptor {
  const column = notMapped.has(property)
    ? undefined
    : columns.find((c) => c.property === property);
  if (!column) {
    throw new MappingError(`${entity.name}.${property}: ${usage} refers to an unmapped property.`);
  }
  return column;
}

function resolveIndexes(
  entity: Function,
  declared: readonly IndexMetadata[],
  columns: readonly ColumnDescriptor[],
  notMapped: ReadonlySet<string>,
): IndexDescriptor[] {
  const groups = new Map<string, { metadata: IndexMetadata; position: number }[]>();
  declared.forEach((metadata, position) => {
    if (!IDENTIFIER.test(metadata.name)) {
      throw new MappingError(`${entity.name}: invalid index name "${metadata.name}".`);
    }
    const group = groups.get(metadata.name) ?? [];
    group.push({ metadata, position });
    groups.set(metadata.name, group);
  });

  return [...groups.entries()].map(([name, members]) => {
    const ordered = [...members].sort(
      (a, b) =>
        (a.metadata.options.order ?? Number.MAX_SAFE_INTEGER) -
          (b.metadata.options.order ?? Number.MAX_SAFE_INTEGER) || a.position - b.position,
    );

    const uniqueFlags = new Set(
      members.map((m) => m.metadata.options.unique).filter((u) => u !== undefined),
    );
    const predicates = new Set(
      members.map((m) => m.metadata.options.where).filter((w) => w !== undefined),
    );
    if (uniqueFlags.size > 1 || predicates.size > 1) {
      throw new MappingError(`${entity.name}: members of index "${name}" disagree on uniqueness or predicate.`);
    }

    const [where] = [...predicates];
    return {
      name,
      unique: uniqueFlags.has(true),
      columns: ordered.map(({ metadata }) => ({
        name: columnFor(entity, columns, notMapped, metadata.property, `index "${name}"`).name,
        descending: metadata.options.descending === true,
      })),
      where,
    };
  });
}

/**
 * Resolves the referenced table and column from the target's own metadata rather
 * than its full descriptor, so mutually referencing entities do not recurse.
 */
function resolveForeignKeyTarget(
  entity: Function,
  metadata: ForeignKeyMetadata,
): { target: Function; table: string; referencedColumn: string } {
  const target = metadata.target();
  const table = typeof target === 'function' ? getTableMetadata(target) : undefined;
  if (!table) {
    throw new MappingError(
      `${entity.name}.${metadata.property}: foreign-key target is not an @Entity class.`,
    );
  }

  const chain = getClassHierarchyMetadata(target);
  const notMapped = new Set(chain.flatMap((c) => c.notMapped));
  const targetColumns = collectColumns(chain.map((c) => c.columns), notMapped).map((c) => c.metadata);

  let referenced: ColumnMetadata | undefined;
  if (metadata.options.referencedProperty) {
    referenced = targetColumns.find((c) => c.property === metadata.options.referencedProperty);
  } else {
    const keys = targetColumns.filter((c) => c.primary);
    referenced = keys.length === 1 ? keys[0] : undefined;
  }

  if (!referenced) {
    throw new MappingError(
      `${entity.name}.${metadata.property}: cannot resolve the referenced column on ${target.name}.`,
    );
  }

  return {
    target,
    table: table.name,
    referencedColumn: referenced.options.name ?? referenced.property,
  };
}

function resolveForeignKeys(
  entity: Function,
  table: TableMetadata,
  declared: readonly ForeignKeyMetadata[],
  columns: readonly ColumnDescriptor[],
  notMapped: ReadonlySet<string>,
): ForeignKeyDescriptor[] {
  const groups = new Map<string, ForeignKeyMetadata[]>();
  for (const metadata of declared) {
    const key = metadata.options.name ?? `${table.name}.${metadata.property}`;
    const group = groups.get(key) ?? [];
    group.push(metadata);
    groups.set(key, group);
  }

  return [...groups.values()].map((members) => {
    const [first] = members;
    const resolved = members.map((m) => ({
      column: columnFor(entity, columns, notMapped, m.property, 'foreign key').name,
      ...resolveForeignKeyTarget(entity, m),
    }));

    const onDelete = first.options.onDelete ?? 'noAction';
    const onUpdate = first.options.onUpdate ?? 'noAction';
    const consistent = members.every(
      (m, i) =>
        resolved[i].target === resolved[0].target &&
        (m.options.onDelete ?? 'noAction') === onDelete &&
        (m.options.onUpdate ?? 'noAction') === onUpdate,
    );
    if (!consistent) {
      throw new MappingError(
        `${entity.name}: members of foreign key "${first.options.name}" must reference the same table with the same actions.`,
      );
    }

    if (first.options.name !== undefined && !IDENTIFIER.test(first.options.name)) {
      throw new MappingError(`${entity.name}: invalid foreign-key name "${first.options.name}".`);
    }

    return {
      name: first.options.name,
      columns: resolved.map((r) => r.column),
      referencedTable: resolved[0].table,
      referencedColumns: resolved.map((r) => r.referencedColumn),
      referencedEntity: resolved[0].target,
      onDelete,
      onUpdate,
    };
  });
}

function deepFreeze<V>(value: V): V {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      if (typeof nested !== 'function') deepFreeze(nested);
    }
  }
  return value;
}
