import {CellValue, ChangeType} from 'app/common/DatasetTypes';
import {isMissing} from 'app/common/nullTokens';
import {normalizeDateOrTimestamp} from 'app/common/parseDate';

/**
 * Returns whether two cells hold the same value. Two missing values are equal. When either value
 * is recognized as a date or timestamp, the normalized forms are compared; otherwise the raw
 * values are, without type coercion (so 5 and "5" differ).
 */
export function valuesEqual(a: CellValue, b: CellValue): boolean {
  if (isMissing(a) && isMissing(b)) { return true; }
  const normA = normalizeDateOrTimestamp(a);
  const normB = normalizeDateOrTimestamp(b);
  if (normA !== a || normB !== b) {
    return normA === normB;
  }
  return a === b;
}

/**
 * Classifies the difference from value `a` (File A) to value `b` (File B).
 */
export function getChangeType(a: CellValue, b: CellValue): ChangeType {
  if (isMissing(a) && !isMissing(b)) { return ChangeType.ValueAdded; }
  if (!isMissing(a) && isMissing(b)) { return ChangeType.ValueRemoved; }
  if (isMissing(a) && isMissing(b)) { return ChangeType.NoChange; }
  return valuesEqual(a, b) ? ChangeType.NoChange : ChangeType.ValueModified;
}
