import type { ColumnDescriptor, MappingDescriptor, Row } from './types';

/**
 * Creates a type predicate that validates a raw row matches the descriptor's
 * columns. Ensures safe deserialization at I/O boundaries.
 * @example
 *   const isItemRow = createRowGuard(buildMapping(Item));
 *   if (isItemRow(row)) { // every mapped column is present }
 */
export function createRowGuard(descriptor: MappingDescriptor) {
  return (data: unknown): data is Row => {
    // Must be object
    if (typeof data !== 'object' || data === null) return false;

    // All columns must exist and hold a compatible storage class
    for (const column of descriptor.columns) {
      if (!(column.name in data)) return false;
      if (!isStorageCompatible(Reflect.get(data, column.name), column)) return false;
    }

    return true;
  };
}

/**
 * Runtime check of SQLite storage classes against the declared column type.
 * SQLite converts freely between INTEGER and REAL, so both accept any number.
 */
function isStorageCompatible(value: unknown, column: ColumnDescriptor): boolean {
  if (value === null) return column.nullable || column.defaultValue !== undefined;

  switch (column.sqlType) {
    case 'INTEGER':
    case 'REAL':
      return typeof value === 'number' || typeof value === 'bigint';
    case 'TEXT':
      return typeof value === 'string';
    case 'BLOB':
      return Buffer.isBuffer(value);
    default:
      return true;
  }
}

