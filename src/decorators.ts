/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store schema information on the class.
 *
 * Key principle: Decorators are purely declarative. They only record what was
 * written on the class; `buildMapping()` validates the whole picture once per
 * type and fails fast on contradictions.
 *
 * Metadata is stored as *own* metadata of each class, so a subclass never
 * mutates the arrays of its base class. The mapper walks the prototype chain.
 */

import 'reflect-metadata';
import { MappingError } from './errors';
import {
  TABLE_KEY,
  COLUMN_KEY,
  INDEX_KEY,
  FOREIGN_KEY,
  NOT_MAPPED_KEY,
  ColumnMetadata,
  ColumnOptions,
  ColumnRole,
  EntityOptions,
  ForeignKeyMetadata,
  ForeignKeyOptions,
  IndexMetadata,
  IndexOptions,
  PrimaryColumnOptions,
  TableMetadata,
} from './types';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Entity decorator maps a TypeScript class to a database table.
 *
 * @example
 * ```typescript
 * @Entity('Items', { softDelete: true, auditTrail: true })
 * class Item extends BaseEntity {
 *   @PrimaryColumn('Id')
 *   id!: string;
 * }
 * ```
 */
export function Entity(tableName: string, options: EntityOptions = {}): ClassDecorator {
  return (target: Function) => {
    if (!tableName || tableName.trim().length === 0) {
      throw new MappingError(`Entity decorator requires a non-empty table name.`);
    }

    if (!IDENTIFIER.test(tableName)) {
      throw new MappingError(
        `Invalid table name "${tableName}". Must start with letter or underscore and contain only alphanumeric characters and underscores.`,
      );
    }

    const metadata: TableMetadata = { name: tableName, options };
    Reflect.defineMetadata(TABLE_KEY, metadata, target);
  };
}

function ownList<M>(key: symbol, target: Function): M[] {
  const existing: unknown = Reflect.getOwnMetadata(key, target);
  if (Array.isArray(existing)) {
    return existing;
  }
  const created: M[] = [];
  Reflect.defineMetadata(key, created, target);
  return created;
}

function registerColumn(
  target: object,
  propertyKey: string | symbol,
  options: PrimaryColumnOptions,
  primary: boolean,
  role: ColumnRole,
): void {
  if (typeof propertyKey !== 'string') {
    throw new MappingError(`Symbol properties cannot be mapped to columns.`);
  }

  // emitDecoratorMetadata supplies the declared type (String, Number, Date, ...)
  const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);

  const columns = ownList<ColumnMetadata>(COLUMN_KEY, target.constructor);
  const metadata: ColumnMetadata = { property: propertyKey, options, designType, primary, role };
  const existing = columns.findIndex((c) => c.property === propertyKey);
  if (existing >= 0) {
    columns[existing] = metadata;
  } else {
    columns.push(metadata);
  }
}

function normalizeOptions<O extends ColumnOptions>(
  nameOrOptions: string | O | undefined,
  options: O | undefined,
): O | ColumnOptions {
  if (typeof nameOrOptions === 'string') {
    return { ...options, name: nameOrOptions };
  }
  return nameOrOptions ?? options ?? {};
}

/**
 * Column decorator maps a TypeScript property to a database column.
 *
 * The logical type is inferred from the property's declared type via
 * emitDecoratorMetadata unless `type` is given. Declare `type` explicitly for
 * union-typed properties, whose emitted metadata is `Object`.
 *
 * @param nameOrOptions - Column name (defaults to the property name) or options
 */
export function Column(
  nameOrOptions?: string | ColumnOptions,
  options?: ColumnOptions,
): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerColumn(target, propertyKey, normalizeOptions(nameOrOptions, options), false, 'data');
  };
}

/**
 * Marks a column as (part of) the primary key. Composite keys list their
 * members by `order`.
 */
export function PrimaryColumn(
  nameOrOptions?: string | PrimaryColumnOptions,
  options?: PrimaryColumnOptions,
): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerColumn(target, propertyKey, normalizeOptions(nameOrOptions, options), true, 'data');
  };
}

/** The optimistic-concurrency token. Always an INTEGER column. */
export function VersionColumn(name = 'Version'): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerColumn(target, propertyKey, { name, type: 'integer', default: 1 }, false, 'version');
  };
}

export function CreatedTimeColumn(name = 'CreatedTime'): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerColumn(target, propertyKey, { name, type: 'datetime' }, false, 'createdTime');
  };
}

export function LastWriteTimeColumn(name = 'LastWriteTime'): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    registerColumn(target, propertyKey, { name, type: 'datetime' }, false, 'lastWriteTime');
  };
}

/**
 * Adds the column to a named index. Properties sharing a name form one
 * composite index ordered by `order`, then by declaration.
 */
export function Index(name: string, options: IndexOptions = {}): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    if (typeof propertyKey !== 'string') {
      throw new MappingError(`Symbol properties cannot be indexed.`);
    }
    ownList<IndexMetadata>(INDEX_KEY, target.constructor).push({
      property: propertyKey,
      name,
      options,
    });
  };
}

/**
 * Declares a foreign key to another entity. The target is passed lazily so
 * entities may reference classes declared later in the module.
 */
export function ForeignKey(
  target: () => Function,
  options: ForeignKeyOptions = {},
): PropertyDecorator {
  return (prototype: object, propertyKey: string | symbol) => {
    if (typeof propertyKey !== 'string') {
      throw new MappingError(`Symbol properties cannot carry foreign keys.`);
    }
    ownList<ForeignKeyMetadata>(FOREIGN_KEY, prototype.constructor).push({
      property: propertyKey,
      target,
      options,
    });
  };
}

/**
 * Excludes a property from the mapping, including one declared on a base class.
 */
export function NotMapped(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    if (typeof propertyKey !== 'string') {
      return;
    }
    ownList<string>(NOT_MAPPED_KEY, target.constructor).push(propertyKey);
  };
}

/**
 * Utility function to extract table metadata from an entity class.
 *
 * @returns The table metadata, or undefined when the class has no @Entity
 */
export function getTableMetadata(entity: Function): TableMetadata | undefined {
  const table: TableMetadata | undefined = Reflect.getOwnMetadata(TABLE_KEY, entity);
  return table;
}

/**
 * Utility function to extract the table name from an entity class.
 *
 * @throws MappingError if entity is not decorated with @Entity
 */
export function getTableName(entity: Function): string {
  const table = getTableMetadata(entity);
  if (!table) {
    throw new MappingError(`Entity ${entity.name} is missing @Entity decorator or has no metadata.`);
  }
  return table.name;
}

/**
 * Own metadata of one class in the chain, leaf first.
 */
export interface ClassMetadata {
  columns: readonly ColumnMetadata[];
  indexes: readonly IndexMetadata[];
  foreignKeys: readonly ForeignKeyMetadata[];
  notMapped: readonly string[];
}

function ownMetadata<M>(key: symbol, target: Function): readonly M[] {
  const value: unknown = Reflect.getOwnMetadata(key, target);
  return Array.isArray(value) ? value : [];
}

/**
 * Collects the metadata of an entity class and all of its base classes,
 * starting with the entity itself.
 */
export function getClassHierarchyMetadata(entity: Function): ClassMetadata[] {
  const chain: ClassMetadata[] = [];
  let current: unknown = entity;
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.push({
      columns: ownMetadata<ColumnMetadata>(COLUMN_KEY, current),
      indexes: ownMetadata<IndexMetadata>(INDEX_KEY, current),
      foreignKeys: ownMetadata<ForeignKeyMetadata>(FOREIGN_KEY, current),
      notMapped: ownMetadata<string>(NOT_MAPPED_KEY, current),
    });
    current = Object.getPrototypeOf(current);
  }
  return chain;
}
