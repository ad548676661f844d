import { UnknownSchemaError } from './base/errors';
import type { SchemaKind, Table } from './base/types';
import { LEGACY_SIGNATURE, NEW_API_SIGNATURE } from './types/transaction.types';

const hasAll = (columns: ReadonlySet<string>, signature: readonly string[]): boolean =>
  signature.every(column => columns.has(column));

/**
 * Classifies a table by its column names alone. The legacy signature is
 * checked first, so a table carrying both sets is treated as legacy.
 */
export const detectSchema = (table: Pick<Table, 'columns'>): SchemaKind => {
  const columns = new Set(table.columns);

  if (hasAll(columns, LEGACY_SIGNATURE)) {
    return 'legacy';
  }

  if (hasAll(columns, NEW_API_SIGNATURE)) {
    return 'new_api';
  }

  throw new UnknownSchemaError([...columns]);
};

/** Non-throwing variant used when scanning candidate header rows. */
export const matchesKnownSchema = (columns: readonly string[]): boolean => {
  const set = new Set(columns);
  return hasAll(set, LEGACY_SIGNATURE) || hasAll(set, NEW_API_SIGNATURE);
};
