import chalk from "chalk";

export type MarkdownTableErrorKind = "invalid_row_length" | "no_rows_specified";

interface MarkdownTableErrorOptions {
  kind: MarkdownTableErrorKind;
  message: string;
  hint?: string;
  expected?: number;
  actual?: number;
}

export class MarkdownTableError extends Error {
  readonly kind: MarkdownTableErrorKind;
  readonly hint?: string;
  readonly expected?: number;
  readonly actual?: number;

  constructor(options: MarkdownTableErrorOptions) {
    super(options.message);
    this.name = "MarkdownTableError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.expected = options.expected;
    this.actual = options.actual;
  }
}

export function invalidRowLength(expected: number, actual: number): MarkdownTableError {
  return new MarkdownTableError({
    kind: "invalid_row_length",
    message: `Invalid row length, expected ${expected} got ${actual}.`,
    hint: `Every row must have ${expected} ${expected === 1 ? "cell" : "cells"}.`,
    expected,
    actual
  });
}

export function noRowsSpecified(): MarkdownTableError {
  return new MarkdownTableError({
    kind: "no_rows_specified",
    message: "A table needs a header or at least one row when it is created.",
    hint: "Pass a header row, or start the table with one data row."
  });
}

export function isMarkdownTableError(value: unknown): value is MarkdownTableError {
  return value instanceof MarkdownTableError;
}

export function renderTableError(error: MarkdownTableError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join("\n");
}

export function formatTableError(error: MarkdownTableError, colors: chalk.Chalk = chalk): string {
  const lines = [colors.red(error.message)];
  if (error.hint) {
    lines.push(colors.dim(`Hint: ${error.hint}`));
  }
  return lines.join("\n");
}
