export type Cell = string | number | boolean | Date | null;
export type JsonCell = string | number | boolean | null;

export interface TimeIndex {
  name: string;
  values: Date[];
}

/** Rows of named columns, optionally keyed by a time index (one value per row). */
export interface Table {
  columns: string[];
  rows: Cell[][];
  index?: TimeIndex;
}

export type TableRecord = Record<string, JsonCell>;
export type NormalizedTable = TableRecord[] | Record<string, never>;

export function emptyTable(columns: string[] = [], indexName?: string): Table {
  return indexName ? { columns, rows: [], index: { name: indexName, values: [] } } : { columns, rows: [] };
}

export function toJsonCell(cell: Cell): JsonCell {
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? null : cell.toISOString();
  }
  if (typeof cell === 'number' && !Number.isFinite(cell)) {
    return null;
  }
  return cell;
}

/**
 * Turns a table into one object per row, field names as keys. A time index becomes the
 * first field of each row. Empty or missing tables become `{}`.
 */
export function normalizeTable(table: Table | null | undefined): NormalizedTable {
  if (!table || table.rows.length === 0) {
    return {};
  }

  return table.rows.map((row, rowIndex) => {
    const record: TableRecord = {};
    if (table.index) {
      record[table.index.name] = toJsonCell(table.index.values[rowIndex] ?? null);
    }
    table.columns.forEach((column, columnIndex) => {
      record[column] = toJsonCell(row[columnIndex] ?? null);
    });
    return record;
  });
}

export function headTable(table: Table, limit: number): Table {
  const count = Math.max(0, limit);
  return {
    columns: table.columns,
    rows: table.rows.slice(0, count),
    index: table.index && { name: table.index.name, values: table.index.values.slice(0, count) },
  };
}

/**
 * Builds a table from a list of objects. Columns are the union of keys in first-seen
 * order unless given; `indexKey` moves a date field into the time index.
 */
export function tableFromRecords(
  records: Array<Record<string, Cell>>,
  options: { columns?: string[]; indexKey?: string; indexName?: string } = {}
): Table {
  const { indexKey } = options;
  const columns = options.columns ?? collectColumns(records).filter(column => column !== indexKey);
  const rows = records.map(record => columns.map(column => record[column] ?? null));

  if (!indexKey) {
    return { columns, rows };
  }

  const values = records.map(record => {
    const value = record[indexKey];
    return value instanceof Date ? value : new Date(Number.NaN);
  });
  return { columns, rows, index: { name: options.indexName ?? indexKey, values } };
}

function collectColumns(records: Array<Record<string, Cell>>): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}
