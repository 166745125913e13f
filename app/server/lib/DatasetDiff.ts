import {compareDatasets, CompareOptions, FileLabel} from 'app/common/DatasetComparator';
import {
  ComparisonTotals, FileSummary, getComparisonTotals, summarizeDataset
} from 'app/common/DatasetSummary';
import {ComparisonResult, Dataset, REQUIRED_COLUMNS} from 'app/common/DatasetTypes';
import {ErrorWithCode} from 'app/common/ErrorWithCode';
import {importCSVFile} from 'app/server/lib/ImportCSV';
import {LogMethods} from 'app/server/lib/LogMethods';

export interface DiffInfo {
  fileA: string;
  fileB: string;
}

export interface DiffOutcome {
  result: ComparisonResult;
  summaryA: FileSummary;
  summaryB: FileSummary;
  totals: ComparisonTotals;
}

export interface DiffFilesOptions extends CompareOptions {
  fileA: string;
  fileB: string;
  naValues?: readonly string[];
}

const _log = new LogMethods('DatasetDiff ', (info: DiffInfo) => ({fileA: info.fileA, fileB: info.fileB}));

/**
 * Throws MISSING_COLUMNS if the dataset lacks any of the columns a comparison needs.
 */
export function checkRequiredColumns(dataset: Dataset, label: FileLabel): void {
  const missingColumns = REQUIRED_COLUMNS.filter(colId => !dataset.columns.includes(colId));
  if (missingColumns.length > 0) {
    throw new ErrorWithCode('MISSING_COLUMNS', `Missing columns in ${label}: ${missingColumns.join(', ')}`,
      {file: label, missingColumns});
  }
}

function isCell(value: unknown): boolean {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Throws MALFORMED_DATASET unless every row is an object whose values are strings, finite
 * numbers or null.
 */
export function assertValidDataset(dataset: Dataset, label: FileLabel): void {
  dataset.rows.forEach((row: unknown, index) => {
    if (typeof row !== 'object' || row === null || Array.isArray(row)) {
      throw new ErrorWithCode('MALFORMED_DATASET', `${label}: row ${index} is not an object`, {file: label});
    }
    for (const [colId, value] of Object.entries(row)) {
      if (!isCell(value)) {
        throw new ErrorWithCode('MALFORMED_DATASET',
          `${label}: row ${index} has an invalid value in column ${colId}`, {file: label});
      }
    }
  });
}

/**
 * Compares two datasets after checking that both have the required columns. Validation messages
 * of the comparison are logged as warnings.
 */
export function diffDatasets(datasetA: Dataset, datasetB: Dataset, info: DiffInfo,
                             options: CompareOptions = {}): DiffOutcome {
  assertValidDataset(datasetA, 'File A');
  assertValidDataset(datasetB, 'File B');
  checkRequiredColumns(datasetA, 'File A');
  checkRequiredColumns(datasetB, 'File B');

  const summaryA = summarizeDataset(datasetA, 'File A');
  const summaryB = summarizeDataset(datasetB, 'File B');
  const result = compareDatasets(datasetA, datasetB, options);
  for (const message of result.validationMessages) {
    _log.warn(info, '%s', message);
  }
  const totals = getComparisonTotals(result);
  _log.info(info, 'compared: %d modified, %d identical, %d only in A, %d only in B, %d cell changes',
    result.modifiedGroups.size, result.identicalGroups.length, result.groupsOnlyInA.size,
    result.groupsOnlyInB.size, totals.cellChanges);
  return {result, summaryA, summaryB, totals};
}

/**
 * Reads two CSV files and compares them.
 */
export async function diffCSVFiles(options: DiffFilesOptions): Promise<DiffOutcome> {
  const {fileA, fileB, naValues, ...compareOptions} = options;
  const [datasetA, datasetB] = await Promise.all([
    importCSVFile(fileA, {label: 'File A', naValues}),
    importCSVFile(fileB, {label: 'File B', naValues}),
  ]);
  const info = {fileA, fileB};
  _log.debug(info, 'read %d rows from File A and %d rows from File B', datasetA.rows.length,
    datasetB.rows.length);
  return diffDatasets(datasetA, datasetB, info, compareOptions);
}
