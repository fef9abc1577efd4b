/**
 * Console Table Renderer
 *
 * Fixed-width text table with one line per benchmark case, followed by
 * the regression summary.
 *
 * @module report/console-table
 */

import {
  formatDeltaCell,
  formatDeltaPct,
  type ComparisonResult,
  type Regression,
} from '@benchdiff/engine';

/** Narrowest column width */
export const MIN_COLUMN_WIDTH = 16;

/** Gap between columns */
export const COLUMN_GAP = '  ';

/**
 * Header cells: key, status, then old/new/delta per metric
 */
export function tableHeaders(metrics: readonly string[]): string[] {
  const headers = ['Benchmark Key', 'Status'];
  for (const metric of metrics) {
    headers.push(`${metric} (old)`, `${metric} (new)`, `${metric} Δ`);
  }
  return headers;
}

/**
 * Pad each cell to its column width. Longer cells are not truncated.
 */
function renderLine(cells: readonly string[], widths: readonly number[]): string {
  return cells.map((cell, i) => cell.padEnd(widths[i])).join(COLUMN_GAP);
}

/**
 * Summary line for one regression: " - Mean in Method=Parse: +10.00%"
 */
export function formatRegression(regression: Regression): string {
  return ` - ${regression.metric} in ${regression.caseKey}: ${formatDeltaPct(regression.deltaPct)}`;
}

/**
 * Render the comparison table and summary as lines of text
 */
export function renderTable(result: ComparisonResult): string[] {
  const headers = tableHeaders(result.metrics);
  const widths = headers.map((header) => Math.max(MIN_COLUMN_WIDTH, header.length));
  const separatorWidth = widths.reduce((sum, width) => sum + width, 0) + COLUMN_GAP.length * (widths.length - 1);

  const lines = [renderLine(headers, widths), '-'.repeat(separatorWidth)];

  for (const row of result.rows) {
    const cells = [row.caseKey, row.status];
    for (const cell of row.cells) {
      cells.push(cell.oldDisplay, cell.newDisplay, formatDeltaCell(cell));
    }
    lines.push(renderLine(cells, widths));
  }

  lines.push('');
  if (result.regressions.length > 0) {
    lines.push('Potential regressions (thresholds applied):');
    for (const regression of result.regressions) {
      lines.push(formatRegression(regression));
    }
  } else {
    lines.push('No regressions detected with current thresholds.');
  }

  return lines;
}
