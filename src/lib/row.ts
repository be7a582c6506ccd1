export interface Displayable {
  toString(): string;
}

/** Implemented by caller types that know how to lay themselves out as a row. */
export interface TableRowSource {
  toTableRow(): TableRow;
}

export type RowLike = TableRow | TableRowSource | Iterable<Displayable>;

export class TableRow {
  readonly cells: readonly string[];

  constructor(cells: readonly string[]) {
    this.cells = Object.freeze([...cells]);
  }

  get length(): number {
    return this.cells.length;
  }

  static from(values: Iterable<Displayable>): TableRow {
    return new TableRow(Array.from(values, (value) => String(value)));
  }

  cellWidth(col: number): number {
    return charCount(this.cells[col] ?? "");
  }

  toString(): string {
    return `TableRow([${this.cells.join(", ")}])`;
  }
}

export function isTableRowSource(value: unknown): value is TableRowSource {
  return typeof value === "object"
    && value !== null
    && "toTableRow" in value
    && typeof value.toTableRow === "function";
}

export function toTableRow(value: RowLike): TableRow {
  if (value instanceof TableRow) {
    return value;
  }
  if (isTableRowSource(value)) {
    return value.toTableRow();
  }
  return TableRow.from(value);
}

// Code points, not UTF-16 units.
export function charCount(text: string): number {
  return Array.from(text).length;
}

export function padEndChars(text: string, width: number): string {
  const missing = width - charCount(text);
  return missing > 0 ? text + " ".repeat(missing) : text;
}
