import { Entity, Flow, Phase } from "./model";

export type CellValue = string | number | boolean | null | Entity | Flow | Phase;

export type Row = Record<string, CellValue>;

/** Column-ordered rows, the shape every result view is returned in. */
export class ResultTable {
  constructor(
    readonly columns: readonly string[],
    readonly rows: readonly Row[],
  ) {}

  get length(): number {
    return this.rows.length;
  }

  column(name: string): CellValue[] {
    if (!this.columns.includes(name)) {
      throw new Error(`no column named ${name}; columns are ${this.columns.join(", ")}`);
    }
    return this.rows.map((row) => row[name] ?? null);
  }
}

export type CsvOptions = {
  separator?: string;
  na?: string;
};

const renderCell = (value: CellValue | undefined, na: string): string => {
  if (value === null || value === undefined) return na;
  if (value instanceof Entity || value instanceof Flow || value instanceof Phase) return value.name;
  return String(value);
};

const quote = (text: string, separator: string): string =>
  text.includes(separator) || text.includes('"') || text.includes("\n") ? `"${text.replace(/"/g, '""')}"` : text;

/** Header row then one line per row; no trailing newline. */
export const toCsv = (table: ResultTable, options: CsvOptions = {}): string => {
  const separator = options.separator ?? ",";
  const na = options.na ?? "NA";
  const lines = [table.columns.map((column) => quote(column, separator)).join(separator)];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => quote(renderCell(row[column], na), separator)).join(separator));
  }
  return lines.join("\n");
};
