import {CellValue, ComparisonResult, Dataset, HISTORY_FLAG} from 'app/common/DatasetTypes';
import {addCountsToMap, countIf, isNonNullish} from 'app/common/gutil';
import {normalizeNullToken} from 'app/common/nullTokens';

export interface ValueCount {
  value: CellValue;
  count: number;
}

/**
 * Statistics about one input file, over all its rows (not only history rows).
 */
export interface FileSummary {
  label: string;
  rowCount: number;
  columnCount: number;
  datasetIdCount: number;       // Distinct present dataset_id values.
  tacticIdCount: number;        // Distinct present tactic_id values, after null-token normalization.
  historyRowCount: number;
  recencyFlagCounts: ValueCount[];
}

export interface ComparisonTotals {
  tacticRecencyChanges: number;
  cellChanges: number;
  unmatchedCombinations: number;
}

export interface Metric {
  metric: string;
  count: number;
}

function distinctCount(values: Iterable<CellValue|undefined>): number {
  return new Set([...values].filter(isNonNullish)).size;
}

/**
 * Counts occurrences of each present value, by descending count. Ties keep the order in which
 * values first appear.
 */
export function valueCounts(values: Iterable<CellValue|undefined>): ValueCount[] {
  const counts = new Map<CellValue, number>();
  addCountsToMap(counts, [...values].filter(isNonNullish));
  return [...counts].map(([value, count]) => ({value, count})).sort((a, b) => b.count - a.count);
}

export function summarizeDataset(dataset: Dataset, label: string): FileSummary {
  const {rows} = dataset;
  return {
    label,
    rowCount: rows.length,
    columnCount: dataset.columns.length,
    datasetIdCount: distinctCount(rows.map(row => row.dataset_id)),
    tacticIdCount: distinctCount(rows.map(row => normalizeNullToken(row.tactic_id))),
    historyRowCount: countIf(rows, row => row.recency_flag === HISTORY_FLAG),
    recencyFlagCounts: valueCounts(rows.map(row => row.recency_flag)),
  };
}

export function getComparisonTotals(result: ComparisonResult): ComparisonTotals {
  const totals: ComparisonTotals = {tacticRecencyChanges: 0, cellChanges: 0, unmatchedCombinations: 0};
  for (const change of result.modifiedGroups.values()) {
    totals.tacticRecencyChanges += change.tacticRecencyChanges.length;
    totals.cellChanges += change.cellChanges.length;
    totals.unmatchedCombinations += change.unmatchedCombinations.onlyInA.length +
      change.unmatchedCombinations.onlyInB.length;
  }
  return totals;
}

/**
 * The overall figures of a comparison, in report order.
 */
export function getOverallMetrics(result: ComparisonResult, summaryA: FileSummary,
                                  summaryB: FileSummary): Metric[] {
  const totals = getComparisonTotals(result);
  return [
    {metric: 'Total Groups in File A', count: summaryA.datasetIdCount},
    {metric: 'Total Groups in File B', count: summaryB.datasetIdCount},
    {metric: 'Groups Only in File A', count: result.groupsOnlyInA.size},
    {metric: 'Groups Only in File B', count: result.groupsOnlyInB.size},
    {metric: 'Modified Groups', count: result.modifiedGroups.size},
    {metric: 'Identical Groups', count: result.identicalGroups.length},
    {metric: 'Total Tactic+Recency Changes', count: totals.tacticRecencyChanges},
    {metric: 'Total Cell Changes', count: totals.cellChanges},
    {metric: 'Total Unmatched Combinations', count: totals.unmatchedCombinations},
  ];
}
