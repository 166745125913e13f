/**
 * Ordering of cell values and rows, used to arrange rows before they are grouped and paired.
 *
 * Values order as: numbers (numerically), then strings (by code point), then missing values.
 * The sort used is stable, so rows that compare equal keep their input order.
 */
import {CellValue, Row} from 'app/common/DatasetTypes';
import {CompareFunc, multiCompareFunc, nativeCompare} from 'app/common/gutil';
import {isMissing} from 'app/common/nullTokens';

/**
 * Empty comparator will treat missing values as last.
 */
export const emptyCompare = (next: CompareFunc<CellValue>) => (val1: CellValue, val2: CellValue) => {
  const isEmptyValue1 = isMissing(val1);
  const isEmptyValue2 = isMissing(val2);

  if (isEmptyValue1 && isEmptyValue2) {
    return 0;
  }
  if (isEmptyValue1) {
    return 1;
  }
  if (isEmptyValue2) {
    return -1;
  }
  return next(val1, val2);
};

/**
 * Compare two present cell values, paying attention to types and values. Native JS comparison
 * can't be used across types because it isn't transitive (both 1 < "2" and "2" < "a" are true,
 * but 1 < "a" is false), so values are compared by type name first.
 */
export function typedCompare(val1: CellValue, val2: CellValue): number {
  const result = nativeCompare(typeof val1, typeof val2);
  if (result !== 0) {
    return result;
  }
  return nativeCompare(val1, val2);
}

export const cellCompare: CompareFunc<CellValue> = emptyCompare(typedCompare);

/**
 * Returns a function comparing rows by the given columns, in priority order.
 */
export function rowCompare(colIds: readonly string[]): CompareFunc<Row> {
  return multiCompareFunc<Row, CellValue>(
    colIds.map(colId => (row: Row) => row[colId] ?? null),
    colIds.map(() => cellCompare),
  );
}

/**
 * Returns a sorted copy of the rows, ordered by the given columns.
 */
export function sortRows(rows: readonly Row[], colIds: readonly string[]): Row[] {
  return [...rows].sort(rowCompare(colIds));
}
