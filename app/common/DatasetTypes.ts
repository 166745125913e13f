/**
 * Types shared by the dataset comparison code, and the column names it relies on.
 *
 * A Dataset is a plain table: an ordered list of column names, and rows mapping column names to
 * cell values. Every row carries a `dataset_id` (its group), a `tactic_id` and a `recency_flag`;
 * only rows flagged as history take part in a comparison.
 *
 * Comparison output is organized in three levels:
 *   - groups (by dataset_id) present only in one file, or present in both and modified/identical;
 *   - within a modified group, (tactic_id, recency_flag) combinations present only in one file,
 *     or present in both with cell-level changes;
 *   - within such a combination, a CellChange for each differing cell of positionally paired rows.
 */

/**
 * A single cell. `null` is the one way to represent a missing value; null-like tokens in the
 * input are turned into it (see nullTokens.ts).
 */
export type CellValue = string|number|null;

/**
 * A row maps column names to values. A column absent from the object reads as missing.
 */
export type Row = Readonly<Record<string, CellValue>>;

export interface Dataset {
  columns: string[];
  rows: Row[];
}

// Columns that must be present in an input file for a comparison to run at all.
export const REQUIRED_COLUMNS = [
  'dataset_id', 'tactic_id', 'recency_flag', 'dataset_nm', 'tactic_nm', 'channel_nm',
] as const;

// Columns whose absence is reported as a validation message by the comparison itself.
export const KEY_COLUMNS = ['tactic_id', 'tactic_nm', 'dataset_id', 'dataset_nm'] as const;

// Never compared, and never reported as a column difference.
export const IGNORED_COLUMN = 'description';

// Value of recency_flag for the rows that are compared; all others are left out.
export const HISTORY_FLAG = 'history';

export const ChangeType = {
  ValueAdded: 'Value Added',
  ValueRemoved: 'Value Removed',
  ValueModified: 'Value Modified',
  NoChange: 'No Change',
  RowAdded: 'Row Added',
  RowRemoved: 'Row Removed',
} as const;
export type ChangeType = typeof ChangeType[keyof typeof ChangeType];

// Placeholders used in CellChange values.
export const MISSING_MARKER = 'NULL';
export const ROW_ADDED_MARKER = 'ROW_ADDED';
export const ROW_REMOVED_MARKER = 'ROW_REMOVED';

/**
 * One column-level difference between paired rows. Field names are kept as they appear in the
 * exported reports.
 */
export interface CellChange {
  dataset_id: CellValue;
  tactic_id: CellValue;
  recency_flag: CellValue;
  Row_Index: number|null;     // Position within the combination; null when both sides have one row.
  Column: string;
  File_A_Value: CellValue;    // MISSING_MARKER for a missing value, ROW_ADDED_MARKER for an added row.
  File_B_Value: CellValue;    // MISSING_MARKER for a missing value, ROW_REMOVED_MARKER for a removed row.
  Change_Type: ChangeType;
}

export interface CombinationKey {
  tactic_id: CellValue;       // null is the single marker for a missing tactic_id.
  recency_flag: CellValue;
}

// Descriptive fields copied into reports.
export interface DescriptiveFields {
  dataset_nm: CellValue;
  tactic_nm: CellValue;
  channel_nm: CellValue;
}

/**
 * One row of a combination present in only one file.
 */
export interface UnmatchedCombination extends CombinationKey, DescriptiveFields {
  dataset_id: CellValue;
  count: 1;
}

/**
 * A combination present in both files, which has at least one cell change.
 */
export interface CombinationChange extends CombinationKey, DescriptiveFields {
  cellChanges: CellChange[];
}

export interface CombinationComparison {
  hasChanges: boolean;
  cellChanges: CellChange[];
}

export interface GroupChange {
  hasChanges: boolean;
  tacticRecencyChanges: CombinationChange[];
  unmatchedCombinations: {
    onlyInA: UnmatchedCombination[];
    onlyInB: UnmatchedCombination[];
  };
  cellChanges: CellChange[];
  combinationCountA: number;
  combinationCountB: number;
  combosOnlyInA: CombinationKey[];
  combosOnlyInB: CombinationKey[];
  commonCombos: CombinationKey[];
}

export interface ColumnDifferences {
  onlyInA: string[];
  onlyInB: string[];
  common: string[];
}

export interface ComparisonResult {
  groupsOnlyInA: Set<CellValue>;
  groupsOnlyInB: Set<CellValue>;
  modifiedGroups: Map<CellValue, GroupChange>;
  identicalGroups: CellValue[];
  columnDifferences: ColumnDifferences;
  validationMessages: string[];
}
