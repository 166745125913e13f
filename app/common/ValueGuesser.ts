import {CellValue} from 'app/common/DatasetTypes';

export type GuessedType = 'Numeric' | 'Text';

export interface GuessResult {
  values: CellValue[];
  type: GuessedType;
}

// Plain decimal numbers, optionally signed, with an optional exponent.
const NUMERIC_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * Class for guessing if an array of values should be interpreted as a specific column type.
 * T is the type of values that strings should be parsed to.
 */
abstract class ValueGuesser<T extends CellValue> {
  public abstract type(): GuessedType;

  /**
   * Parse a single string to a typed value. If the string cannot be parsed, return null.
   */
  public abstract parse(value: string): T | null;

  /**
   * Parse all the values according to the guessed type, with null for missing values. A column is
   * converted as a whole: return null if any present value can't be parsed.
   */
  public guess(values: ReadonlyArray<string | null>): GuessResult | null {
    const result: CellValue[] = [];
    let parsedAny = false;
    for (const value of values) {
      if (value === null) {
        result.push(null);
        continue;
      }
      const parsed = this.parse(value);
      if (parsed === null) { return null; }
      parsedAny = true;
      result.push(parsed);
    }
    return parsedAny ? {values: result, type: this.type()} : null;
  }
}

export class NumericGuesser extends ValueGuesser<number> {
  public type(): GuessedType {
    return 'Numeric';
  }

  public parse(value: string): number | null {
    const trimmed = value.trim();
    if (!NUMERIC_REGEX.test(trimmed)) { return null; }
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) { return null; }
    // Integers too large to hold exactly (such as long ids) keep the column as text.
    if (INTEGER_REGEX.test(trimmed) && !Number.isSafeInteger(parsed)) { return null; }
    return parsed;
  }
}

/**
 * Returns the column's values converted to their guessed type. Columns that are entirely numeric
 * (ignoring missing values) become numbers; anything else, including an all-missing column, is
 * kept as text.
 */
export function guessColumnValues(values: ReadonlyArray<string | null>): GuessResult {
  return new NumericGuesser().guess(values) ?? {values: [...values], type: 'Text'};
}
