/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colourising output, plus formatters for the
 * report's numbers and tables.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatTable } from './terminal';
 *
 * console.log(bold('Overview'));
 * console.log(formatTable(['Song', 'Streams'], [['Solar Flare', '3,000']]).join('\n'));
 * ```
 *
 * Setting NO_COLOR (any value) turns colours off.
 */

// =============================================================================
// Text Styles & Colours
// =============================================================================

function style(code: number, s: string): string {
  if (process.env.NO_COLOR !== undefined) {
    return s;
  }
  return `\x1b[${code}m${s}\x1b[0m`;
}

/**
 * Makes text bold. Use for headings and key values.
 *
 * @example
 * console.log(bold('Artist Pulse Report'));
 */
export const bold = (s: string): string => style(1, s);

/** Dims text. Use for hints, dates and secondary values. */
export const dim = (s: string): string => style(2, s);

export const green = (s: string): string => style(32, s);

export const yellow = (s: string): string => style(33, s);

export const red = (s: string): string => style(31, s);

export const cyan = (s: string): string => style(36, s);

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @param width - Width of the separator in characters (default: 50)
 *
 * @example
 * console.log(formatSeparator());
 * // Output: "──────────────────────────────────────────────────"
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats a count with thousands separators; null prints as a dash.
 *
 * @example
 * formatNumber(1234567); // "1,234,567"
 * formatNumber(12.5, 1); // "12.5"
 */
export function formatNumber(value: number | null, fractionDigits: number = 0): string {
  if (value === null) {
    return '-';
  }
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

/**
 * Formats a dollar amount with two decimals.
 *
 * @example
 * formatCurrency(1234.5); // "$1,234.50"
 */
export function formatCurrency(value: number): string {
  return `$${formatNumber(value, 2)}`;
}

/**
 * Formats a percentage (already scaled to 0-100) with one decimal.
 */
export function formatPercent(value: number | null): string {
  return value === null ? '-' : `${value.toFixed(1)}%`;
}

/**
 * Green for growth, red for decline, plain otherwise. Applies to labels
 * such as "+12.5%".
 */
export function colorGrowth(label: string): string {
  if (label.startsWith('+')) {
    return green(label);
  }
  if (label.startsWith('-')) {
    return red(label);
  }
  return label;
}

/**
 * Lays out rows as aligned columns. The first column is left aligned and
 * the rest right aligned, with a separator under the header.
 *
 * @returns One string per line
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  );

  const formatRow = (cells: readonly string[]): string =>
    widths
      .map((width, i) => {
        const cell = cells[i] ?? '';
        return i === 0 ? cell.padEnd(width) : cell.padStart(width);
      })
      .join('  ')
      .trimEnd();

  const totalWidth = widths.reduce((sum, width) => sum + width, 0) + 2 * (widths.length - 1);

  return [
    bold(formatRow(headers)),
    formatSeparator(totalWidth),
    ...rows.map(formatRow),
  ];
}
