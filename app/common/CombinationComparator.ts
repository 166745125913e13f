import {getChangeType, valuesEqual} from 'app/common/CellCompare';
import {
  CellChange, CellValue, ChangeType, CombinationComparison, CombinationKey, IGNORED_COLUMN,
  MISSING_MARKER, Row, ROW_ADDED_MARKER, ROW_REMOVED_MARKER
} from 'app/common/DatasetTypes';
import {isMissing} from 'app/common/nullTokens';

export interface RowPair {
  index: number;
  rowA: Row;
  rowB: Row;
}

export interface RowPairing {
  pairs: RowPair[];
  // Rows of A with no partner in B, and the other way around, with their positions.
  extraA: Array<{index: number, row: Row}>;
  extraB: Array<{index: number, row: Row}>;
}

/**
 * Decides which row of File A is compared with which row of File B within one combination. Both
 * lists come in sorted order.
 */
export type RowPairingPolicy = (rowsA: readonly Row[], rowsB: readonly Row[]) => RowPairing;

/**
 * Pairs the i-th row of A with the i-th row of B, up to the shorter length. Remaining rows of
 * the longer side are extras.
 */
export const pairBySortOrder: RowPairingPolicy = (rowsA, rowsB) => {
  const common = Math.min(rowsA.length, rowsB.length);
  const pairs: RowPair[] = [];
  for (let index = 0; index < common; index++) {
    pairs.push({index, rowA: rowsA[index], rowB: rowsB[index]});
  }
  return {
    pairs,
    extraA: rowsA.slice(common).map((row, i) => ({index: common + i, row})),
    extraB: rowsB.slice(common).map((row, i) => ({index: common + i, row})),
  };
};

function displayValue(value: CellValue|undefined): CellValue {
  return isMissing(value) ? MISSING_MARKER : value;
}

/**
 * Compares the rows of one (tactic_id, recency_flag) combination present in both files, over the
 * given common columns (the ignored description column is skipped).
 *
 * Paired rows give a CellChange for every column whose values differ; Row_Index is set only when
 * either side has more than one row. Every column of an extra row gives a CellChange marking the
 * row as added or removed, whatever its values.
 */
export function compareCombination(
  rowsA: readonly Row[],
  rowsB: readonly Row[],
  key: CombinationKey,
  commonColumns: readonly string[],
  datasetId: CellValue,
  policy: RowPairingPolicy = pairBySortOrder,
): CombinationComparison {
  const columns = commonColumns.filter(colId => colId !== IGNORED_COLUMN);
  const multipleRows = Math.max(rowsA.length, rowsB.length) > 1;
  const {pairs, extraA, extraB} = policy(rowsA, rowsB);
  const cellChanges: CellChange[] = [];

  const makeChange = (rowIndex: number|null, colId: string, valueA: CellValue, valueB: CellValue,
                      changeType: ChangeType): CellChange => ({
    dataset_id: datasetId,
    tactic_id: key.tactic_id,
    recency_flag: key.recency_flag,
    Row_Index: rowIndex,
    Column: colId,
    File_A_Value: valueA,
    File_B_Value: valueB,
    Change_Type: changeType,
  });

  for (const {index, rowA, rowB} of pairs) {
    for (const colId of columns) {
      const valueA = rowA[colId] ?? null;
      const valueB = rowB[colId] ?? null;
      if (isMissing(valueA) && isMissing(valueB)) { continue; }
      if (!valuesEqual(valueA, valueB)) {
        cellChanges.push(makeChange(multipleRows ? index : null, colId,
          displayValue(valueA), displayValue(valueB), getChangeType(valueA, valueB)));
      }
    }
  }

  for (const {index, row} of extraA) {
    for (const colId of columns) {
      cellChanges.push(makeChange(index, colId, displayValue(row[colId]), ROW_REMOVED_MARKER,
        ChangeType.RowRemoved));
    }
  }

  for (const {index, row} of extraB) {
    for (const colId of columns) {
      cellChanges.push(makeChange(index, colId, ROW_ADDED_MARKER, displayValue(row[colId]),
        ChangeType.RowAdded));
    }
  }

  return {hasChanges: cellChanges.length > 0, cellChanges};
}
