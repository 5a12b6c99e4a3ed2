const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Day offsets between each serial epoch and 1970-01-01
const UNIX_EPOCH_SERIAL_1900 = 25569;
const UNIX_EPOCH_SERIAL_1904 = 24107;

// 9999-12-31 in the 1900 system
const MAX_SERIAL = 2958465;

/** Matches number formats such as m/d/yyyy, dd/mm/yy or m/d/yyyy h:mm. */
export const GENERIC_DATE_FORMAT = /\w{1,4}\/\w{1,4}\/\w{1,4}( \w{1,4}:\w{1,4})?/;

/**
 * Converts a serial date value into a UTC `Date`, or `null` when the value is
 * not a finite number inside the supported range.
 *
 * The 1900 system counts 1900-02-29 as a real day; serials below 61 are
 * shifted by one so that 1 maps to 1900-01-01.
 */
export function serialToDate(serial: number, date1904 = false): Date | null {
  if (!Number.isFinite(serial) || serial < 0 || serial > MAX_SERIAL) return null;

  let days: number;
  if (date1904) {
    days = serial - UNIX_EPOCH_SERIAL_1904;
  } else {
    days = serial - UNIX_EPOCH_SERIAL_1900 + (serial < 61 ? 1 : 0);
  }
  return new Date(Math.round(days * MS_PER_DAY));
}

export function isDateFormat(numberFormat: string, custom?: RegExp): boolean {
  if (!numberFormat) return false;
  return GENERIC_DATE_FORMAT.test(numberFormat) || (custom?.test(numberFormat) ?? false);
}
