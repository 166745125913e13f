/**
 * Entry point of the comparison: matches the history rows of two datasets by dataset_id group,
 * then by (tactic_id, recency_flag) combination, then cell by cell.
 *
 * Problems found in the inputs (missing key columns, rows without a tactic_id or dataset_id) do
 * not stop the comparison. They are returned as human-readable validation messages.
 */
import {pairBySortOrder, RowPairingPolicy} from 'app/common/CombinationComparator';
import {
  CellValue, ColumnDifferences, ComparisonResult, Dataset, GroupChange, HISTORY_FLAG, IGNORED_COLUMN,
  KEY_COLUMNS, Row
} from 'app/common/DatasetTypes';
import {compareGroup} from 'app/common/GroupComparator';
import {countIf, setDifference} from 'app/common/gutil';
import {isMissing, normalizeNullTokens} from 'app/common/nullTokens';
import {cellCompare, sortRows} from 'app/common/SortFunc';
import difference = require('lodash/difference');
import intersection = require('lodash/intersection');
import without = require('lodash/without');

export interface CompareOptions {
  policy?: RowPairingPolicy;
}

export const FILE_LABELS = ['File A', 'File B'] as const;
export type FileLabel = typeof FILE_LABELS[number];

/**
 * Compares two datasets. Neither input is modified.
 */
export function compareDatasets(datasetA: Dataset, datasetB: Dataset,
                                options: CompareOptions = {}): ComparisonResult {
  const policy = options.policy ?? pairBySortOrder;
  const validationMessages: string[] = [];

  const normA = normalizeNullTokens(datasetA, ['tactic_id', 'tactic_nm']);
  const normB = normalizeNullTokens(datasetB, ['tactic_id', 'tactic_nm']);

  validationMessages.push(...checkDataset(normA, 'File A'), ...checkDataset(normB, 'File B'));

  const groupsA = groupByDatasetId(getHistoryRows(normA, 'File A', validationMessages));
  const groupsB = groupByDatasetId(getHistoryRows(normB, 'File B', validationMessages));

  const idsA = new Set(groupsA.keys());
  const idsB = new Set(groupsB.keys());
  const columnDifferences = getColumnDifferences(normA.columns, normB.columns);

  const modifiedGroups = new Map<CellValue, GroupChange>();
  const identicalGroups: CellValue[] = [];
  for (const datasetId of sortGroupIds([...idsA].filter(id => idsB.has(id)))) {
    const change = compareGroup(groupsA.get(datasetId) ?? [], groupsB.get(datasetId) ?? [],
      datasetId, columnDifferences.common, policy);
    if (change.hasChanges) {
      modifiedGroups.set(datasetId, change);
    } else {
      identicalGroups.push(datasetId);
    }
  }

  return {
    groupsOnlyInA: setDifference(idsA, idsB),
    groupsOnlyInB: setDifference(idsB, idsA),
    modifiedGroups,
    identicalGroups,
    columnDifferences,
    validationMessages,
  };
}

/**
 * Returns the messages describing problems of one dataset: rows without a tactic_id (counted over
 * all rows, history or not), and missing key columns.
 */
export function checkDataset(dataset: Dataset, label: FileLabel): string[] {
  const messages: string[] = [];
  if (dataset.columns.includes('tactic_id')) {
    const nullCount = countIf(dataset.rows, row => isMissing(row.tactic_id));
    if (nullCount > 0) {
      messages.push(`${label} contains ${nullCount} rows with NULL tactic_id values`);
    }
  }
  const missing = KEY_COLUMNS.filter(colId => !dataset.columns.includes(colId));
  if (missing.length > 0) {
    messages.push(`${label} is missing the following key columns: ${missing.join(', ')}`);
  }
  return messages;
}

/**
 * Returns the history rows that have a dataset_id, sorted by dataset_id, tactic_id and
 * recency_flag. History rows without a dataset_id are reported in `messages` and left out.
 */
function getHistoryRows(dataset: Dataset, label: FileLabel, messages: string[]): Row[] {
  const history = dataset.rows.filter(row => row.recency_flag === HISTORY_FLAG);
  const withId = history.filter(row => !isMissing(row.dataset_id));
  const skipped = history.length - withId.length;
  if (skipped > 0) {
    messages.push(`${label} contains ${skipped} history rows with NULL dataset_id values; ` +
      'they are not compared');
  }
  return sortRows(withId, ['dataset_id', 'tactic_id', 'recency_flag']);
}

// Keys of the returned map follow the order of the (sorted) rows.
function groupByDatasetId(rows: readonly Row[]): Map<CellValue, Row[]> {
  const groups = new Map<CellValue, Row[]>();
  for (const row of rows) {
    const datasetId = row.dataset_id ?? null;
    const group = groups.get(datasetId);
    if (group) {
      group.push(row);
    } else {
      groups.set(datasetId, [row]);
    }
  }
  return groups;
}

/**
 * Splits the columns of both files, minus the ignored description column, into those only in A,
 * only in B, and common to both. Each list follows the column order of the file it comes from
 * (File A's order for common columns).
 */
export function getColumnDifferences(columnsA: readonly string[], columnsB: readonly string[]): ColumnDifferences {
  const colsA = without(columnsA, IGNORED_COLUMN);
  const colsB = without(columnsB, IGNORED_COLUMN);
  return {
    onlyInA: difference(colsA, colsB),
    onlyInB: difference(colsB, colsA),
    common: intersection(colsA, colsB),
  };
}

/**
 * Returns group ids in display order.
 */
export function sortGroupIds(ids: Iterable<CellValue>): CellValue[] {
  return [...ids].sort(cellCompare);
}
