/**
 * Pivoter
 *
 * Reshapes long-format rows (one observation per row) into a wide cross
 * tabulation keyed by (row category, column category), e.g. engagement
 * metric × age group for a heatmap.
 *
 * Absent combinations are never materialised: a cell exists only when at
 * least one source row contributed a non-null value to it. This holds for
 * every aggregation function, `sum` and `count` included, so a missing
 * combination can always be told apart from a real zero.
 */

import { reduceValues, type AggFunc } from './aggregator';
import { numericValue, type CellValue, type TimeSeriesTable } from './table';

// ============================================================================
// Types
// ============================================================================

/**
 * A 2D cross tabulation. `index` and `columns` list the row and column
 * categories in sorted order; `values[row][column]` holds the aggregated
 * value, and is simply missing for absent combinations.
 */
export interface PivotTable {
  readonly index: readonly string[];
  readonly columns: readonly string[];
  readonly values: Readonly<Record<string, Readonly<Record<string, number>>>>;
}

// ============================================================================
// Pivot
// ============================================================================

function categoryLabel(cell: CellValue | undefined): string | null {
  if (cell === null || cell === undefined) return null;
  return String(cell);
}

const compareLabels = (a: string, b: string): number =>
  a.localeCompare(b, 'en', { numeric: true });

/**
 * Category labels are data, so they key objects without a prototype: a
 * label such as `__proto__` must become an ordinary own entry.
 */
function createLabelRecord<V>(): Record<string, V> {
  return Object.create(null);
}

/**
 * Builds a pivot table.
 *
 * @param table - Long-format rows
 * @param indexField - Field whose values become row categories
 * @param columnsField - Field whose values become column categories
 * @param valuesField - Numeric field to aggregate
 * @param aggFunc - Reduction within each (row, column) group (default 'sum')
 *
 * Rows with a null index or column cell are skipped, as are null values.
 *
 * @example
 * ```typescript
 * const heatmap = pivot(engagement, 'metric', 'age_group', 'value', 'mean');
 * heatmap.values['Save Rate']['18-24']; // 0.42
 * ```
 */
export function pivot(
  table: TimeSeriesTable,
  indexField: string,
  columnsField: string,
  valuesField: string,
  aggFunc: AggFunc = 'sum'
): PivotTable {
  const groups = new Map<string, Map<string, number[]>>();
  const columnSet = new Set<string>();

  for (const row of table) {
    const rowKey = categoryLabel(row[indexField]);
    const columnKey = categoryLabel(row[columnsField]);
    const value = numericValue(row, valuesField);
    if (rowKey === null || columnKey === null || value === null) continue;

    let rowGroups = groups.get(rowKey);
    if (!rowGroups) {
      rowGroups = new Map();
      groups.set(rowKey, rowGroups);
    }
    const cell = rowGroups.get(columnKey);
    if (cell) {
      cell.push(value);
    } else {
      rowGroups.set(columnKey, [value]);
    }
    columnSet.add(columnKey);
  }

  const index = [...groups.keys()].sort(compareLabels);
  const columns = [...columnSet].sort(compareLabels);

  const values = createLabelRecord<Readonly<Record<string, number>>>();
  for (const rowKey of index) {
    const cells = createLabelRecord<number>();
    const rowGroups = groups.get(rowKey);
    if (rowGroups) {
      for (const [columnKey, groupValues] of rowGroups) {
        const reduced = reduceValues(groupValues, aggFunc);
        if (reduced !== null) cells[columnKey] = reduced;
      }
    }
    values[rowKey] = Object.freeze(cells);
  }

  return Object.freeze({
    index: Object.freeze(index),
    columns: Object.freeze(columns),
    values: Object.freeze(values),
  });
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Reads one cell; `undefined` when the combination is absent.
 */
export function pivotValue(table: PivotTable, row: string, column: string): number | undefined {
  const cells = Object.prototype.hasOwnProperty.call(table.values, row) ? table.values[row] : undefined;
  if (!cells || !Object.prototype.hasOwnProperty.call(cells, column)) return undefined;
  return cells[column];
}

/** Number of materialised cells. */
export function pivotSize(table: PivotTable): number {
  return Object.values(table.values).reduce((count, cells) => count + Object.keys(cells).length, 0);
}

/**
 * Dense matrix in `index` × `columns` order for heatmaps, with null for
 * absent combinations.
 */
export function toMatrix(table: PivotTable): (number | null)[][] {
  return table.index.map((row) =>
    table.columns.map((column) => pivotValue(table, row, column) ?? null)
  );
}
