import test from "node:test";
import assert from "node:assert/strict";
import { TableRow, charCount, isTableRowSource, toTableRow } from "../src/lib/row";

class User {
  constructor(readonly name: string, readonly age: number) {}

  toTableRow(): TableRow {
    return new TableRow([this.name, this.age.toString()]);
  }
}

test("toTableRow converts array values with their default string form", () => {
  const row = toTableRow(["a", 1, true, 2n]);
  assert.deepEqual(row.cells, ["a", "1", "true", "2"]);
});

test("toTableRow accepts any iterable in iteration order", () => {
  function* cells(): Generator<number> {
    yield 3;
    yield 1;
    yield 2;
  }
  assert.deepEqual(toTableRow(cells()).cells, ["3", "1", "2"]);
  assert.deepEqual(toTableRow(new Set(["x", "y"])).cells, ["x", "y"]);
});

test("toTableRow uses a caller-defined row source", () => {
  const row = toTableRow(new User("Jessica", 28));
  assert.deepEqual(row.cells, ["Jessica", "28"]);
});

test("toTableRow returns an existing row unchanged", () => {
  const row = new TableRow(["a"]);
  assert.equal(toTableRow(row), row);
});

test("toTableRow calls toString on plain objects", () => {
  const status = { toString: () => "running" };
  assert.deepEqual(toTableRow([status]).cells, ["running"]);
});

test("TableRow keeps its own copy of the cells", () => {
  const source = ["a", "b"];
  const row = new TableRow(source);
  source[0] = "changed";
  assert.deepEqual(row.cells, ["a", "b"]);
  assert.equal(Object.isFrozen(row.cells), true);
  assert.equal(row.length, 2);
});

test("cellWidth counts code points", () => {
  const row = new TableRow(["ab", "\u{1F600}x", ""]);
  assert.equal(row.cellWidth(0), 2);
  assert.equal(row.cellWidth(1), 2);
  assert.equal(row.cellWidth(2), 0);
});

test("charCount differs from UTF-16 length for astral characters", () => {
  assert.equal("\u{1F600}".length, 2);
  assert.equal(charCount("\u{1F600}"), 1);
});

test("isTableRowSource rejects values without a toTableRow function", () => {
  assert.equal(isTableRowSource(new User("Dennis", 22)), true);
  assert.equal(isTableRowSource({ toTableRow: "nope" }), false);
  assert.equal(isTableRowSource(["a"]), false);
  assert.equal(isTableRowSource(null), false);
});
