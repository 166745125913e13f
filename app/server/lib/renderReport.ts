import {sortGroupIds} from 'app/common/DatasetComparator';
import {FileSummary, getOverallMetrics} from 'app/common/DatasetSummary';
import {
  CellChange, CellValue, ColumnDifferences, CombinationKey, GroupChange, MISSING_MARKER, UnmatchedCombination
} from 'app/common/DatasetTypes';
import {isMissing} from 'app/common/nullTokens';
import {DiffOutcome} from 'app/server/lib/DatasetDiff';

function show(value: CellValue|undefined): string {
  return isMissing(value) ? MISSING_MARKER : String(value);
}

function showList(values: Iterable<CellValue>): string {
  const list = [...values].map(show);
  return list.length ? list.join(', ') : 'none';
}

function showKey(key: CombinationKey): string {
  return `tactic_id=${show(key.tactic_id)}, recency_flag=${show(key.recency_flag)}`;
}

function renderFileSummary(summary: FileSummary): string[] {
  const flags = summary.recencyFlagCounts.map(({value, count}) => `${show(value)} (${count})`);
  return [
    `## ${summary.label}`,
    `- Rows: ${summary.rowCount}`,
    `- Columns: ${summary.columnCount}`,
    `- Unique dataset_ids: ${summary.datasetIdCount}`,
    `- Unique tactic_ids: ${summary.tacticIdCount}`,
    `- History rows: ${summary.historyRowCount}`,
    `- recency_flag values: ${flags.length ? flags.join(', ') : 'none'}`,
    '',
  ];
}

function renderUnmatched(record: UnmatchedCombination, side: string): string {
  return `- Only in ${side}: ${showKey(record)} ` +
    `(tactic_nm=${show(record.tactic_nm)}, channel_nm=${show(record.channel_nm)})`;
}

function renderCellChange(change: CellChange): string {
  const row = change.Row_Index === null ? '' : `[row ${change.Row_Index}] `;
  return `  - ${row}${change.Column}: ${show(change.File_A_Value)} -> ${show(change.File_B_Value)} ` +
    `(${change.Change_Type})`;
}

/**
 * Renders the outcome of a comparison as markdown text, for reading in a terminal.
 */
export function renderReport(outcome: DiffOutcome): string {
  const {result, summaryA, summaryB} = outcome;
  const lines: string[] = ['# Dataset comparison', ''];

  lines.push(...renderFileSummary(summaryA), ...renderFileSummary(summaryB));

  if (result.validationMessages.length) {
    lines.push('## Validation', ...result.validationMessages.map(msg => `- ${msg}`), '');
  }

  lines.push('## Summary');
  for (const {metric, count} of getOverallMetrics(result, summaryA, summaryB)) {
    lines.push(`- ${metric}: ${count}`);
  }
  lines.push('');

  const {onlyInA, onlyInB} = result.columnDifferences;
  lines.push('## Column differences',
    `- Only in File A: ${showList(onlyInA)}`,
    `- Only in File B: ${showList(onlyInB)}`,
    '');

  lines.push('## Groups only in File A', `- ${showList(sortGroupIds(result.groupsOnlyInA))}`, '');
  lines.push('## Groups only in File B', `- ${showList(sortGroupIds(result.groupsOnlyInB))}`, '');

  lines.push('## Modified groups');
  if (!result.modifiedGroups.size) { lines.push('- none'); }
  for (const datasetId of sortGroupIds(result.modifiedGroups.keys())) {
    const change = result.modifiedGroups.get(datasetId);
    if (!change) { continue; }
    lines.push('', `### dataset_id ${show(datasetId)}`,
      `- Combinations: ${change.combinationCountA} in File A, ${change.combinationCountB} in File B`);
    lines.push(...change.unmatchedCombinations.onlyInA.map(record => renderUnmatched(record, 'File A')));
    lines.push(...change.unmatchedCombinations.onlyInB.map(record => renderUnmatched(record, 'File B')));
    for (const combo of change.tacticRecencyChanges) {
      lines.push(`- Modified: ${showKey(combo)} (tactic_nm=${show(combo.tactic_nm)}): ` +
        `${combo.cellChanges.length} cell changes`);
      lines.push(...combo.cellChanges.map(renderCellChange));
    }
  }
  lines.push('');

  lines.push('## Identical groups', `- ${showList(result.identicalGroups)}`);
  return lines.join('\n') + '\n';
}

export interface OutcomeJSON extends Omit<DiffOutcome, 'result'> {
  result: {
    groupsOnlyInA: CellValue[];
    groupsOnlyInB: CellValue[];
    modifiedGroups: Array<{dataset_id: CellValue} & GroupChange>;
    identicalGroups: CellValue[];
    columnDifferences: ColumnDifferences;
    validationMessages: string[];
  };
}

/**
 * Converts the outcome of a comparison to plain JSON-friendly data: sets become sorted lists, and
 * modified groups a list in dataset_id order.
 */
export function outcomeToJSON(outcome: DiffOutcome): OutcomeJSON {
  const {result} = outcome;
  const modifiedGroups: Array<{dataset_id: CellValue} & GroupChange> = [];
  for (const datasetId of sortGroupIds(result.modifiedGroups.keys())) {
    const change = result.modifiedGroups.get(datasetId);
    if (change) { modifiedGroups.push({dataset_id: datasetId, ...change}); }
  }
  return {
    ...outcome,
    result: {
      groupsOnlyInA: sortGroupIds(result.groupsOnlyInA),
      groupsOnlyInB: sortGroupIds(result.groupsOnlyInB),
      modifiedGroups,
      identicalGroups: result.identicalGroups,
      columnDifferences: result.columnDifferences,
      validationMessages: result.validationMessages,
    },
  };
}
