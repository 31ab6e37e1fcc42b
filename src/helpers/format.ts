/**
 * PDF formatting utilities.
 */

/**
 * Format a number for PDF output.
 *
 * Integers are written without a decimal point; reals keep at most
 * five decimals with trailing zeros stripped.
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  const str = value.toFixed(5).replace(/\.?0+$/, "");

  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a date as a PDF date string in UTC (PDF 1.7, section 7.9.4).
 *
 * @example
 * ```ts
 * formatPdfDate(new Date("2025-01-05T12:00:00Z")) // "D:20250105120000Z"
 * ```
 */
export function formatPdfDate(date: Date): string {
  const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

  return (
    `D:${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
