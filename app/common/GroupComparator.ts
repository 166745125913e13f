import {compareCombination, pairBySortOrder, RowPairingPolicy} from 'app/common/CombinationComparator';
import {
  CellValue, CombinationChange, CombinationKey, DescriptiveFields, GroupChange, IGNORED_COLUMN, Row,
  UnmatchedCombination
} from 'app/common/DatasetTypes';
import {CompareFunc, multiCompareFunc} from 'app/common/gutil';
import {isMissing, normalizeNullToken} from 'app/common/nullTokens';
import {cellCompare} from 'app/common/SortFunc';

interface KeyedRows {
  key: CombinationKey;
  rows: Row[];
}

export const compareKeys: CompareFunc<CombinationKey> = multiCompareFunc<CombinationKey, CellValue>(
  [k => k.tactic_id, k => k.recency_flag],
  [cellCompare, cellCompare],
);

export function getCombinationKey(row: Row): CombinationKey {
  return {
    tactic_id: normalizeNullToken(row.tactic_id),
    recency_flag: row.recency_flag ?? null,
  };
}

// Keys are told apart by type as well as value: tactic_id 5 and "5" are different combinations.
export function encodeKey(key: CombinationKey): string {
  return JSON.stringify([key.tactic_id, key.recency_flag]);
}

// Sorts rows by combination key (stable), and splits them into combinations.
function partitionByKey(rows: readonly Row[]): Map<string, KeyedRows> {
  const result = new Map<string, KeyedRows>();
  const sorted = [...rows].sort((a, b) => compareKeys(getCombinationKey(a), getCombinationKey(b)));
  for (const row of sorted) {
    const key = getCombinationKey(row);
    const encoded = encodeKey(key);
    const entry = result.get(encoded);
    if (entry) {
      entry.rows.push(row);
    } else {
      result.set(encoded, {key, rows: [row]});
    }
  }
  return result;
}

function toUnmatched(datasetId: CellValue, key: CombinationKey, row: Row): UnmatchedCombination {
  return {
    dataset_id: datasetId,
    tactic_id: key.tactic_id,
    recency_flag: key.recency_flag,
    count: 1,
    ...getDescriptiveFields(row),
  };
}

function getDescriptiveFields(row: Row|undefined): DescriptiveFields {
  return {
    dataset_nm: row?.dataset_nm ?? null,
    tactic_nm: row?.tactic_nm ?? null,
    channel_nm: row?.channel_nm ?? null,
  };
}

/**
 * Picks the descriptive fields of a changed combination: each from the first row of File B,
 * falling back to the first row of File A when File B's is missing.
 */
export function pickDescriptiveFields(rowsA: readonly Row[], rowsB: readonly Row[]): DescriptiveFields {
  const fromA = getDescriptiveFields(rowsA[0]);
  const fromB = getDescriptiveFields(rowsB[0]);
  return {
    dataset_nm: isMissing(fromB.dataset_nm) ? fromA.dataset_nm : fromB.dataset_nm,
    tactic_nm: isMissing(fromB.tactic_nm) ? fromA.tactic_nm : fromB.tactic_nm,
    channel_nm: isMissing(fromB.channel_nm) ? fromA.channel_nm : fromB.channel_nm,
  };
}

/**
 * Compares the history rows of one dataset_id group between File A and File B.
 *
 * Rows are sorted by (tactic_id, recency_flag) and split into combinations. Combinations present
 * on one side only are reported row by row; those present on both sides are compared cell by
 * cell, and kept when they have changes. Keys are reported in sorted order.
 */
export function compareGroup(
  groupA: readonly Row[],
  groupB: readonly Row[],
  datasetId: CellValue,
  commonColumns: readonly string[],
  policy: RowPairingPolicy = pairBySortOrder,
): GroupChange {
  const columns = commonColumns.filter(colId => colId !== IGNORED_COLUMN);
  const combosA = partitionByKey(groupA);
  const combosB = partitionByKey(groupB);

  const combosOnlyInA: CombinationKey[] = [];
  const combosOnlyInB: CombinationKey[] = [];
  const commonCombos: CombinationKey[] = [];
  const allKeys = new Map<string, CombinationKey>();
  for (const [encoded, {key}] of [...combosA, ...combosB]) {
    allKeys.set(encoded, key);
  }
  for (const [encoded, key] of [...allKeys].sort((a, b) => compareKeys(a[1], b[1]))) {
    const inA = combosA.has(encoded);
    const inB = combosB.has(encoded);
    if (inA && inB) {
      commonCombos.push(key);
    } else if (inA) {
      combosOnlyInA.push(key);
    } else {
      combosOnlyInB.push(key);
    }
  }

  const onlyInA: UnmatchedCombination[] = [];
  const onlyInB: UnmatchedCombination[] = [];
  for (const key of combosOnlyInA) {
    for (const row of combosA.get(encodeKey(key))?.rows ?? []) {
      onlyInA.push(toUnmatched(datasetId, key, row));
    }
  }
  for (const key of combosOnlyInB) {
    for (const row of combosB.get(encodeKey(key))?.rows ?? []) {
      onlyInB.push(toUnmatched(datasetId, key, row));
    }
  }

  const tacticRecencyChanges: CombinationChange[] = [];
  for (const key of commonCombos) {
    const encoded = encodeKey(key);
    const rowsA = combosA.get(encoded)?.rows ?? [];
    const rowsB = combosB.get(encoded)?.rows ?? [];
    const comparison = compareCombination(rowsA, rowsB, key, columns, datasetId, policy);
    if (comparison.hasChanges) {
      tacticRecencyChanges.push({
        tactic_id: key.tactic_id,
        recency_flag: key.recency_flag,
        ...pickDescriptiveFields(rowsA, rowsB),
        cellChanges: comparison.cellChanges,
      });
    }
  }

  return {
    hasChanges: combosOnlyInA.length > 0 || combosOnlyInB.length > 0 || tacticRecencyChanges.length > 0,
    tacticRecencyChanges,
    unmatchedCombinations: {onlyInA, onlyInB},
    cellChanges: tacticRecencyChanges.flatMap(change => change.cellChanges),
    combinationCountA: combosA.size,
    combinationCountB: combosB.size,
    combosOnlyInA,
    combosOnlyInB,
    commonCombos,
  };
}
