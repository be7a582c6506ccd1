import { invalidRowLength, noRowsSpecified } from "./errors";
import { type Displayable, type RowLike, TableRow, padEndChars, toTableRow } from "./row";

export interface TableColumn<T> {
  header: string;
  value: (record: T) => Displayable;
}

export class MarkdownTable {
  readonly header?: TableRow;
  readonly width: number;
  private readonly bodyRows: TableRow[];

  constructor(header: RowLike | undefined, rows: Iterable<RowLike>) {
    const headerRow = header === undefined ? undefined : toTableRow(header);
    const bodyRows = Array.from(rows, (row) => toTableRow(row));

    const width = headerRow?.length ?? bodyRows[0]?.length;
    if (width === undefined) {
      throw noRowsSpecified();
    }

    for (const row of bodyRows) {
      assertRowLength(width, row);
    }

    this.header = headerRow;
    this.width = width;
    this.bodyRows = bodyRows;
  }

  get rows(): readonly TableRow[] {
    return this.bodyRows;
  }

  get rowCount(): number {
    return this.bodyRows.length;
  }

  addRow(row: RowLike): void {
    const next = toTableRow(row);
    assertRowLength(this.width, next);
    this.bodyRows.push(next);
  }

  contentWidth(col: number): number | undefined {
    if (!this.hasColumn(col)) {
      return undefined;
    }
    return this.bodyRows.reduce((widest, row) => Math.max(widest, row.cellWidth(col)), 0);
  }

  columnWidth(col: number): number | undefined {
    const content = this.contentWidth(col);
    if (content === undefined) {
      return undefined;
    }
    return this.header ? Math.max(content, this.header.cellWidth(col)) : content;
  }

  columnWidths(): number[] {
    const widths: number[] = [];
    for (let col = 0; col < this.width; col++) {
      widths.push(this.columnWidth(col) ?? 0);
    }
    return widths;
  }

  render(): string {
    const widths = this.columnWidths();
    const lines: string[] = [];

    if (this.header) {
      lines.push(renderLine(this.header.cells, widths));
      lines.push(renderLine(widths.map((width) => "-".repeat(width)), widths));
    }
    for (const row of this.bodyRows) {
      lines.push(renderLine(row.cells, widths));
    }

    return lines.map((line) => `${line}\n`).join("");
  }

  toString(): string {
    return this.render();
  }

  private hasColumn(col: number): boolean {
    return Number.isInteger(col) && col >= 0 && col < this.width;
  }
}

export function tableFromRecords<T>(records: Iterable<T>, columns: readonly TableColumn<T>[]): MarkdownTable {
  const header = columns.map((column) => column.header);
  const rows = Array.from(records, (record) => columns.map((column) => column.value(record)));
  return new MarkdownTable(header, rows);
}

function assertRowLength(expected: number, row: TableRow): void {
  if (row.length !== expected) {
    throw invalidRowLength(expected, row.length);
  }
}

function renderLine(cells: readonly string[], widths: readonly number[]): string {
  const body = widths.map((width, idx) => `| ${padEndChars(cells[idx] ?? "", width)} `).join("");
  return `${body}|`;
}
