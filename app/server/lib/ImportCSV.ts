/**
 * Reads CSV files into Datasets.
 *
 * The first record holds column names. Cells matching one of the NA values become missing, and a
 * column whose present values are all numbers is converted to numbers.
 */
import {CellValue, Dataset, Row} from 'app/common/DatasetTypes';
import {ErrorWithCode, getErrorMessage} from 'app/common/ErrorWithCode';
import {guessColumnValues} from 'app/common/ValueGuesser';
import log from 'app/server/lib/log';
import {parse} from 'csv/sync';
import * as fse from 'fs-extra';

// Values read as missing, unless other values are given.
export const DEFAULT_NA_VALUES: readonly string[] = [
  '', '#N/A', '#N/A N/A', '#NA', '-1.#IND', '-1.#QNAN', '-NaN', '-nan', '1.#IND', '1.#QNAN',
  '<NA>', 'N/A', 'NA', 'NULL', 'NaN', 'None', 'n/a', 'nan', 'null',
];

export interface ImportOptions {
  naValues?: readonly string[];
  label?: string;         // Name of the input in error messages, e.g. "File A".
}

function isRecordList(value: unknown): value is string[][] {
  return Array.isArray(value) &&
    value.every(record => Array.isArray(record) && record.every(cell => typeof cell === 'string'));
}

/**
 * Gives unique names to columns: blank names become "Unnamed: <index>", and repeated names get
 * ".1", ".2", etc. appended.
 */
export function makeUniqueColumnNames(header: readonly string[]): string[] {
  const seen = new Set<string>();
  return header.map((name, index) => {
    const base = name.trim() ? name : `Unnamed: ${index}`;
    let unique = base;
    for (let i = 1; seen.has(unique); i++) {
      unique = `${base}.${i}`;
    }
    seen.add(unique);
    return unique;
  });
}

/**
 * Parses CSV text into a Dataset.
 */
export function parseCSV(text: string, options: ImportOptions = {}): Dataset {
  const label = options.label || 'input';
  const naValues = new Set(options.naValues ?? DEFAULT_NA_VALUES);
  let records: unknown;
  try {
    records = parse(text, {bom: true, skip_empty_lines: true, relax_column_count: true});
  } catch (err) {
    throw new ErrorWithCode('UNREADABLE_FILE', `Could not parse ${label} as CSV: ${getErrorMessage(err)}`,
      {file: label});
  }
  if (!isRecordList(records) || records.length === 0) {
    throw new ErrorWithCode('UNREADABLE_FILE', `No columns to parse from ${label}`, {file: label});
  }

  const [header, ...body] = records;
  const columns = makeUniqueColumnNames(header);
  const rawColumns: Array<Array<string|null>> = columns.map(() => []);
  body.forEach((record, r) => {
    if (record.length > columns.length) {
      throw new ErrorWithCode('UNREADABLE_FILE',
        `Error parsing ${label}: expected ${columns.length} fields in line ${r + 2}, saw ${record.length}`,
        {file: label});
    }
    columns.forEach((_colId, c) => {
      const cell = record[c];
      rawColumns[c].push(cell === undefined || naValues.has(cell) ? null : cell);
    });
  });

  const values: CellValue[][] = rawColumns.map(raw => guessColumnValues(raw).values);
  const rows: Row[] = body.map((_record, r) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((colId, c) => { row[colId] = values[c][r]; });
    return row;
  });
  return {columns, rows};
}

/**
 * Reads and parses a CSV file.
 */
export async function importCSVFile(path: string, options: ImportOptions = {}): Promise<Dataset> {
  const label = options.label || path;
  let text: string;
  try {
    text = await fse.readFile(path, 'utf8');
  } catch (err) {
    throw new ErrorWithCode('UNREADABLE_FILE', `Could not read ${label}: ${getErrorMessage(err)}`,
      {file: label, path});
  }
  const dataset = parseCSV(text, {...options, label});
  log.debug('Read %d rows and %d columns from %s', dataset.rows.length, dataset.columns.length, path);
  return dataset;
}
