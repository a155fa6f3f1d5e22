import type { Cell, Table } from './types.js';

/** Midnight UTC dates become `YYYY-MM-DD`; other dates keep the full ISO timestamp. */
export function normalizeCell(cell: Cell): Cell {
  if (!(cell instanceof Date)) return cell;
  const iso = cell.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

/** Dates become ISO strings so fresh and cached results are identical. */
export function normalizeTable(table: Table): Table {
  const hasDates = table.rows.some((row) => row.some((cell) => cell instanceof Date));
  if (!hasDates) return table;
  return { columns: table.columns, rows: table.rows.map((row) => row.map(normalizeCell)) };
}
