import {CellValue} from 'app/common/DatasetTypes';
import {isMissing} from 'app/common/nullTokens';
import moment from 'moment-timezone';

// Values with a time of day. Anything else is only ever tried as a calendar date.
const TIME_REGEX = /\d{1,2}:\d{2}/;

// Formats tried, in order and in strict mode, for values that include a time of day.
const DATETIME_FORMATS: moment.MomentFormatSpecification = [
  moment.ISO_8601,
  'YYYY/MM/DD HH:mm:ss',
  'YYYY/MM/DD HH:mm',
  'YYYY/M/D H:mm:ss',
  'YYYY/M/D H:mm',
  'MM/DD/YYYY HH:mm:ss',
  'MM/DD/YYYY HH:mm',
  'M/D/YYYY H:mm:ss',
  'M/D/YYYY H:mm',
  'M/D/YYYY h:mm:ss A',
  'M/D/YYYY h:mm A',
  'D MMM YYYY H:mm:ss',
  'D MMM YYYY H:mm',
  'D MMMM YYYY H:mm:ss',
  'D MMMM YYYY H:mm',
  'MMM D, YYYY H:mm:ss',
  'MMM D, YYYY H:mm',
  'MMM D, YYYY h:mm A',
  'MMM D YYYY H:mm:ss',
  'MMM D YYYY H:mm',
  'MMMM D, YYYY H:mm:ss',
  'MMMM D, YYYY H:mm',
  'MMMM D, YYYY h:mm A',
  'MMMM D YYYY H:mm:ss',
  'MMMM D YYYY H:mm',
];

// Fractional seconds as written in the value; moment itself keeps only milliseconds.
const FRACTION_REGEX = /:\d{2}[.,](\d+)/;

// Formats tried, in order and in strict mode, for calendar dates. Month-first wins over
// day-first for ambiguous slashed dates. Strict single-letter tokens may reject leading zeros,
// hence the padded variants.
const DATE_FORMATS: string[] = [
  'YYYY-MM-DD',
  'YYYY-M-D',
  'YYYY/MM/DD',
  'YYYY/M/D',
  'YYYYMMDD',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'MM/DD/YY',
  'M/D/YY',
  'DD/MM/YYYY',
  'D/M/YYYY',
  'MM-DD-YYYY',
  'DD.MM.YYYY',
  'D.M.YYYY',
  'D MMM YYYY',
  'D MMMM YYYY',
  'MMM D, YYYY',
  'MMM D YYYY',
  'MMMM D, YYYY',
  'MMMM D YYYY',
];

// Fractions of a second are shown with six digits, padded or cut, and only when non-zero.
function getMicroseconds(value: string): string {
  const digits = FRACTION_REGEX.exec(value)?.[1] ?? '';
  const micros = digits.padEnd(6, '0').slice(0, 6);
  return /^0+$/.test(micros) ? '' : '.' + micros;
}

/**
 * Normalizes a value that may be a date or a timestamp, so that differently formatted values can
 * be compared. Returns:
 *  - for text longer than 19 characters, with a space at offset 10 and a '+' somewhere (e.g.
 *    "2024-01-05 10:00:00.000000+00:00"), just the first 10 characters;
 *  - for text with a time of day, its ISO form "YYYY-MM-DDTHH:mm:ss[.ffffff]" followed by the
 *    value's own UTC offset, with anything from the first '+' onwards dropped (so only negative
 *    offsets remain);
 *  - for a calendar date, "YYYY-MM-DD";
 *  - anything else (missing values and numbers included) unchanged.
 *
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeDateOrTimestamp(value: CellValue): CellValue {
  if (isMissing(value) || typeof value !== 'string') { return value; }

  if (value.length > 19 && value[10] === ' ' && value.includes('+')) {
    return value.slice(0, 10);
  }

  if (TIME_REGEX.test(value)) {
    const parsed = moment.parseZone(value, DATETIME_FORMATS, true);
    if (parsed.isValid()) {
      return (parsed.format('YYYY-MM-DD[T]HH:mm:ss') + getMicroseconds(value) + parsed.format('Z'))
        .split('+')[0];
    }
  }

  const date = moment.utc(value, DATE_FORMATS, true);
  if (date.isValid()) {
    return date.format('YYYY-MM-DD');
  }
  return value;
}
