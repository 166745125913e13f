import {sortGroupIds} from 'app/common/DatasetComparator';
import {getOverallMetrics, FileSummary} from 'app/common/DatasetSummary';
import {CellValue, ComparisonResult} from 'app/common/DatasetTypes';
import {isMissing} from 'app/common/nullTokens';
import log from 'app/server/lib/log';
import {stringify} from 'csv/sync';
import * as fse from 'fs-extra';
import * as path from 'path';

// Written in place of missing descriptive fields (names of datasets, tactics and channels).
const NOT_AVAILABLE = 'N/A';

export interface ReportTable {
  fileName: string;
  headers: string[];
  rows: string[][];
}

function formatValue(value: CellValue|undefined): string {
  return isMissing(value) ? '' : String(value);
}

function formatDescriptive(value: CellValue|undefined): string {
  return isMissing(value) ? NOT_AVAILABLE : String(value);
}

/**
 * Arranges a comparison into the report tables. The cell changes, changed combinations and
 * unmatched combinations tables are left out when they would be empty; the overall summary is
 * always included.
 */
export function buildReportTables(result: ComparisonResult, summaryA: FileSummary,
                                  summaryB: FileSummary): ReportTable[] {
  const cellChanges: string[][] = [];
  const combinations: string[][] = [];
  const unmatched: string[][] = [];

  for (const datasetId of sortGroupIds(result.modifiedGroups.keys())) {
    const change = result.modifiedGroups.get(datasetId);
    if (!change) { continue; }
    for (const c of change.cellChanges) {
      cellChanges.push([c.dataset_id, c.tactic_id, c.recency_flag, c.Row_Index, c.Column, c.File_A_Value,
        c.File_B_Value, c.Change_Type].map(formatValue));
    }
    for (const combo of change.tacticRecencyChanges) {
      combinations.push([
        formatValue(datasetId), formatDescriptive(combo.dataset_nm), formatValue(combo.tactic_id),
        formatDescriptive(combo.tactic_nm), formatDescriptive(combo.channel_nm),
        formatValue(combo.recency_flag), 'modified', String(combo.cellChanges.length),
      ]);
    }
    const {onlyInA, onlyInB} = change.unmatchedCombinations;
    for (const [records, status, changeType] of [
      [onlyInA, 'only_in_file_a', 'removed'],
      [onlyInB, 'only_in_file_b', 'added'],
    ] as const) {
      for (const record of records) {
        unmatched.push([
          formatValue(record.dataset_id), formatDescriptive(record.dataset_nm), formatValue(record.tactic_id),
          formatDescriptive(record.tactic_nm), formatDescriptive(record.channel_nm),
          formatValue(record.recency_flag), status, changeType,
        ]);
      }
    }
  }

  const tables: ReportTable[] = [];
  if (cellChanges.length) {
    tables.push({
      fileName: 'detailed_cell_changes_report.csv',
      headers: ['dataset_id', 'tactic_id', 'recency_flag', 'Row_Index', 'Column', 'File_A_Value',
        'File_B_Value', 'Change_Type'],
      rows: cellChanges,
    });
  }
  if (combinations.length) {
    tables.push({
      fileName: 'tactic_recency_summary.csv',
      headers: ['dataset_id', 'dataset_nm', 'tactic_id', 'tactic_nm', 'channel_nm', 'recency_flag',
        'change_type', 'cell_changes_count'],
      rows: combinations,
    });
  }
  if (unmatched.length) {
    tables.push({
      fileName: 'unmatched_combinations_report.csv',
      headers: ['dataset_id', 'dataset_nm', 'tactic_id', 'tactic_nm', 'channel_nm', 'recency_flag',
        'status', 'change_type'],
      rows: unmatched,
    });
  }
  tables.push({
    fileName: 'overall_comparison_summary.csv',
    headers: ['Metric', 'Count'],
    rows: getOverallMetrics(result, summaryA, summaryB).map(m => [m.metric, String(m.count)]),
  });
  return tables;
}

/**
 * Returns the CSV text of a table, starting with its header line.
 */
export function tableToCsv(table: ReportTable): string {
  return stringify([table.headers, ...table.rows]);
}

/**
 * Writes the tables as CSV files into `dir`, creating it if needed. Returns the paths written.
 */
export async function writeReports(dir: string, tables: readonly ReportTable[]): Promise<string[]> {
  log.info('Generating .csv reports in %s...', dir);
  await fse.mkdirp(dir);
  const paths: string[] = [];
  for (const table of tables) {
    const filePath = path.join(dir, table.fileName);
    await fse.writeFile(filePath, tableToCsv(table));
    paths.push(filePath);
  }
  return paths;
}
