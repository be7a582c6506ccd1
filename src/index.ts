export { MarkdownTable, tableFromRecords, type TableColumn } from "./lib/table";
export {
  TableRow,
  charCount,
  isTableRowSource,
  toTableRow,
  type Displayable,
  type RowLike,
  type TableRowSource
} from "./lib/row";
export {
  MarkdownTableError,
  formatTableError,
  isMarkdownTableError,
  renderTableError,
  type MarkdownTableErrorKind
} from "./lib/errors";
