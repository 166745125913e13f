import {CellValue, Dataset, Row} from 'app/common/DatasetTypes';

// Textual values that mean "no value" in the compared columns.
export const NULL_TOKENS: ReadonlySet<string> = new Set(['', 'NULL', 'null', 'None']);

export function isMissing(value: CellValue|undefined): value is null|undefined {
  return value === null || value === undefined;
}

/**
 * Returns null for a null-like token or a missing value, and the value itself otherwise.
 * Numbers are never tokens.
 */
export function normalizeNullToken(value: CellValue|undefined): CellValue {
  if (isMissing(value)) { return null; }
  return (typeof value === 'string' && NULL_TOKENS.has(value)) ? null : value;
}

/**
 * Returns a copy of the dataset with null-like tokens replaced by null in the given columns.
 * Columns the dataset doesn't have are skipped. The input is left untouched.
 */
export function normalizeNullTokens(dataset: Dataset, colIds: readonly string[]): Dataset {
  const present = colIds.filter(colId => dataset.columns.includes(colId));
  if (!present.length) { return dataset; }
  const rows = dataset.rows.map((row): Row => {
    const updated: Record<string, CellValue> = {...row};
    for (const colId of present) {
      updated[colId] = normalizeNullToken(row[colId]);
    }
    return updated;
  });
  return {columns: dataset.columns, rows};
}
